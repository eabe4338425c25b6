/**
 * 저장소의 외래 키 위반. 참조 대상 행이 저장 직전에 사라진 경우입니다.
 */
export class MissingReferenceError extends Error {
  constructor(
    public readonly entity: string,
    cause?: unknown,
  ) {
    super(`Missing reference from ${entity}`, { cause });
    this.name = MissingReferenceError.name;
  }
}
