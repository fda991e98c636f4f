import type { Board, Position } from '@snake-agent/shared';
import { CELL, DIRECTIONS, DIRECTION_VECTORS } from '@snake-agent/shared';

/**
 * 도달 가능 영역 크기 (BFS 플러드 필)
 *
 * 시작 칸에서 스네이크 칸을 지나지 않고 도달 가능한 칸 수를 셉니다.
 * 시작 칸은 값과 무관하게 포함됩니다.
 *
 * @param board 보드 인코딩
 * @param start 시작 위치
 * @returns 도달 가능한 칸 수 (시작 칸이 보드 밖이면 0)
 */
export function reachableArea(board: Board, start: Position): number {
  if (board[start.y]?.[start.x] === undefined) return 0;

  const key = (pos: Position): number => pos.y * board.length + pos.x;
  const visited = new Set<number>([key(start)]);
  const queue: Position[] = [start];

  for (let head = 0; head < queue.length; head++) {
    const current = queue[head];
    if (current === undefined) break;

    for (const dir of DIRECTIONS) {
      const vec = DIRECTION_VECTORS[dir];
      const next: Position = { x: current.x + vec.x, y: current.y + vec.y };
      const cell = board[next.y]?.[next.x];
      if (cell === undefined || cell === CELL.SNAKE) continue;
      if (visited.has(key(next))) continue;
      visited.add(key(next));
      queue.push(next);
    }
  }

  return visited.size;
}
