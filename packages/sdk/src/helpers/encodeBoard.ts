import type { Board, CellValue, Position, SnakeBody } from '@snake-agent/shared';
import { CELL } from '@snake-agent/shared';
import { isOnGrid } from './isUnsafe.js';

/**
 * 보드 상태를 size×size 정수 행렬로 인코딩
 *
 * - 0: 빈칸
 * - 1: 스네이크 몸통 (겹친 세그먼트는 마지막 기록이 남지만 값은 모두 1)
 * - 2: 먹이 (몸통 기록 이후에 설정)
 *
 * 보드 밖 좌표는 건너뜁니다. 호출마다 새 행렬을 반환합니다.
 *
 * @param size 그리드 크기
 * @param snakeBody 스네이크 몸통
 * @param food 먹이 위치 (없으면 null)
 * @returns [y][x] 인덱싱 보드
 */
export function encodeBoard(size: number, snakeBody: SnakeBody, food: Position | null): Board {
  const board: CellValue[][] = Array.from({ length: size }, () =>
    Array.from({ length: size }, (): CellValue => CELL.EMPTY),
  );

  for (const segment of snakeBody) {
    const row = board[segment.y];
    if (row !== undefined && isOnGrid(segment, size)) {
      row[segment.x] = CELL.SNAKE;
    }
  }

  if (food !== null && isOnGrid(food, size)) {
    const row = board[food.y];
    if (row !== undefined) row[food.x] = CELL.FOOD;
  }

  return board;
}
