/**
 * `a,b,c` 형태의 쿼리 값을 배열로 바꿉니다. 빈 항목은 버립니다.
 */
export const toIdList = ({ value }: { value: unknown }): unknown => {
  if (typeof value !== 'string') return value;
  return value
    .split(',')
    .map((id) => id.trim())
    .filter((id) => id.length > 0);
};

export const trimString = ({ value }: { value: unknown }): unknown =>
  typeof value === 'string' ? value.trim() : value;
