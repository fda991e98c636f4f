import type { ActionCandidate, Direction, PlannerWeights, Position, SnakeBody } from '@snake-agent/shared';
import { DIRECTIONS, DIRECTION_VECTORS, DEFAULT_PLANNER_WEIGHTS } from '@snake-agent/shared';
import { isUnsafe } from './isUnsafe.js';
import { manhattan } from './manhattan.js';

/**
 * 4방향 행동 후보 생성 및 비용 계산
 *
 * 각 방향에 대해 이동 후 위치, 안전 여부, 먹이까지의 맨해튼 거리,
 * 방향 전환 비용을 구하고 가중 합으로 총 비용을 계산합니다.
 * 후보는 비용과 무관하게 항상 DIRECTIONS 순서로 반환됩니다.
 *
 * @param head 현재 머리 위치
 * @param food 먹이 위치 (보드가 가득 차면 null, 거리 0으로 취급)
 * @param snakeBody 현재 몸통
 * @param currentDirection 현재 진행 방향
 * @param size 그리드 크기
 * @param weights 거리/전환 가중치 (기본: 단순 합)
 * @returns 4개의 행동 후보
 */
export function planActions(
  head: Position,
  food: Position | null,
  snakeBody: SnakeBody,
  currentDirection: Direction,
  size: number,
  weights: PlannerWeights = DEFAULT_PLANNER_WEIGHTS,
): ActionCandidate[] {
  return DIRECTIONS.map((direction) => {
    const vec = DIRECTION_VECTORS[direction];
    const position: Position = { x: head.x + vec.x, y: head.y + vec.y };
    const distance = food === null ? 0 : manhattan(position, food);
    const turnCost = direction === currentDirection ? 0 : 1;

    return {
      direction,
      position,
      distance,
      turnCost,
      totalCost: weights.distance * distance + weights.turn * turnCost,
      unsafe: isUnsafe(position, size, snakeBody),
    };
  });
}
