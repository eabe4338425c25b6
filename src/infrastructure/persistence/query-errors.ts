import { QueryFailedError } from 'typeorm';

const MYSQL_DUPLICATE_ENTRY = 'ER_DUP_ENTRY';
const MYSQL_NO_REFERENCED_ROW = 'ER_NO_REFERENCED_ROW_2';

function hasDriverCode(error: unknown, code: string): boolean {
  if (!(error instanceof QueryFailedError)) {
    return false;
  }
  const driverError: unknown = error.driverError;
  return (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError &&
    driverError.code === code
  );
}

/**
 * mysql2 드라이버의 유니크 키 위반(errno 1062) 여부
 */
export function isUniqueViolation(error: unknown): boolean {
  return hasDriverCode(error, MYSQL_DUPLICATE_ENTRY);
}

/** 참조하는 부모 행이 없는 외래 키 위반(errno 1452) 여부 */
export function isForeignKeyViolation(error: unknown): boolean {
  return hasDriverCode(error, MYSQL_NO_REFERENCED_ROW);
}
