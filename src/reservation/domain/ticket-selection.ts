import { TheatreHall } from '../../catalog/domain/theatre-hall.entity';

export interface TicketSelection {
  performanceId: string;
  row: number;
  seat: number;
}

export enum TicketProblemReason {
  PERFORMANCE_NOT_FOUND = 'PERFORMANCE_NOT_FOUND',
  ROW_OUT_OF_RANGE = 'ROW_OUT_OF_RANGE',
  SEAT_OUT_OF_RANGE = 'SEAT_OUT_OF_RANGE',
  DUPLICATE_IN_REQUEST = 'DUPLICATE_IN_REQUEST',
  ALREADY_BOOKED = 'ALREADY_BOOKED',
}

export interface TicketProblem extends TicketSelection {
  /** 요청 배열에서의 위치 (0부터) */
  index: number;
  reason: TicketProblemReason;
  message: string;
}

export const seatKey = ({ performanceId, row, seat }: TicketSelection): string =>
  `${performanceId}:${row}:${seat}`;

const problemAt = (
  index: number,
  selection: TicketSelection,
  reason: TicketProblemReason,
  message: string,
): TicketProblem => ({
  index,
  performanceId: selection.performanceId,
  row: selection.row,
  seat: selection.seat,
  reason,
  message,
});

/**
 * 각 좌석 선택을 해당 공연의 상영관 크기 기준으로 검사합니다.
 * 이미 판매된 좌석 여부는 여기서 보지 않습니다.
 *
 * @param hallsByPerformanceId 존재하는 공연만 담긴 공연 ID → 상영관 맵
 */
export function findSelectionProblems(
  selections: TicketSelection[],
  hallsByPerformanceId: ReadonlyMap<string, TheatreHall>,
): TicketProblem[] {
  const problems: TicketProblem[] = [];
  const seen = new Set<string>();

  selections.forEach((selection, index) => {
    const hall = hallsByPerformanceId.get(selection.performanceId);
    if (!hall) {
      problems.push(
        problemAt(index, selection, TicketProblemReason.PERFORMANCE_NOT_FOUND, '공연을 찾을 수 없습니다.'),
      );
      return;
    }

    if (!hall.isRowInRange(selection.row)) {
      problems.push(
        problemAt(
          index,
          selection,
          TicketProblemReason.ROW_OUT_OF_RANGE,
          `행 번호는 1 이상 ${hall.rows} 이하여야 합니다.`,
        ),
      );
    }

    if (!hall.isSeatInRange(selection.seat)) {
      problems.push(
        problemAt(
          index,
          selection,
          TicketProblemReason.SEAT_OUT_OF_RANGE,
          `좌석 번호는 1 이상 ${hall.seatsInRow} 이하여야 합니다.`,
        ),
      );
    }

    const key = seatKey(selection);
    if (seen.has(key)) {
      problems.push(
        problemAt(
          index,
          selection,
          TicketProblemReason.DUPLICATE_IN_REQUEST,
          '같은 요청에 중복된 좌석이 있습니다.',
        ),
      );
    }
    seen.add(key);
  });

  return problems;
}

/**
 * 이미 판매된 좌석과 겹치는 선택을 ALREADY_BOOKED 문제로 변환합니다.
 */
export function findBookedProblems(
  selections: TicketSelection[],
  taken: TicketSelection[],
): TicketProblem[] {
  const takenKeys = new Set(taken.map(seatKey));

  return selections.flatMap((selection, index) =>
    takenKeys.has(seatKey(selection))
      ? [problemAt(index, selection, TicketProblemReason.ALREADY_BOOKED, '이미 예약된 좌석입니다.')]
      : [],
  );
}
