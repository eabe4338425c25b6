/**
 * 저장소의 유니크 제약 위반.
 * 영속성 계층에서 드라이버 에러를 이 타입으로 변환해 서비스에 전달합니다.
 */
export class DuplicateEntryError extends Error {
  constructor(
    public readonly entity: string,
    cause?: unknown,
  ) {
    super(`Duplicate ${entity} entry`, { cause });
    this.name = DuplicateEntryError.name;
  }
}
