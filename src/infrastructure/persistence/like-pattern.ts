/**
 * 부분 일치 LIKE 패턴. `%`, `_`, `\`는 리터럴로 이스케이프합니다.
 */
export const containsPattern = (value: string): string =>
  `%${value.replace(/[\\%_]/g, (char) => `\\${char}`)}%`;
