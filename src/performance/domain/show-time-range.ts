const DAY_MS = 24 * 60 * 60 * 1000;
const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/** 양 끝을 포함하는 상영 시각 구간 */
export interface ShowTimeRange {
  from?: Date;
  to?: Date;
}

/**
 * `YYYY-MM-DD`를 해당 UTC 하루 구간으로 변환합니다.
 * 형식이 맞지 않거나 존재하지 않는 날짜면 null을 반환합니다.
 */
export function utcDayRange(date: string): Required<ShowTimeRange> | null {
  const match = DATE_PATTERN.exec(date);
  if (!match) return null;

  const [, year, month, day] = match.map(Number);
  const start = new Date(Date.UTC(year, month - 1, day));
  if (
    start.getUTCFullYear() !== year ||
    start.getUTCMonth() !== month - 1 ||
    start.getUTCDate() !== day
  ) {
    return null;
  }

  return { from: start, to: new Date(start.getTime() + DAY_MS - 1) };
}

/**
 * 여러 구간 조건의 교집합. 조건이 하나도 없으면 undefined.
 */
export function intersectRanges(...ranges: ShowTimeRange[]): ShowTimeRange | undefined {
  let from: Date | undefined;
  let to: Date | undefined;

  for (const range of ranges) {
    if (range.from && (!from || range.from > from)) from = range.from;
    if (range.to && (!to || range.to < to)) to = range.to;
  }

  if (!from && !to) return undefined;
  return { ...(from && { from }), ...(to && { to }) };
}
