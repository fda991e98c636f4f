import { SnakeAgent } from '../SnakeAgent.js';
import type { ActionCandidate, Board, Direction, Observation, Position, SnakeBody } from '@snake-agent/shared';
import { NoSafeMoveError } from '@snake-agent/shared';
import { encodeBoard } from '../helpers/encodeBoard.js';
import { pathfind } from '../helpers/pathfind.js';
import { reachableArea } from '../helpers/reachableArea.js';

/** 이동 후 먹이로 가는 경로가 없을 때의 벌점 */
const UNREACHABLE_FOOD_PENALTY = 1000;
/** 이동 후 먹이와 꼬리 모두에 닿지 못하고 공간도 좁을 때의 벌점 */
const ISOLATION_PENALTY = 500;

const samePosition = (a: Position, b: Position): boolean => a.x === b.x && a.y === b.y;

/** 같은 칸이면 도달한 것으로 보고, 아니면 A* 경로 존재 여부 */
function canReach(from: Position, to: Position, board: Board): boolean {
  return samePosition(from, to) || pathfind(from, to, board).length > 0;
}

/**
 * 후보 칸으로 이동한 뒤의 예측 벌점
 *
 * 이동 후 몸통(머리 추가, 먹지 않으면 꼬리 제거)으로 보드를 다시 만든 뒤
 * - 새 머리에서 먹이까지 경로가 없으면 +1000
 * - 먹이와 새 꼬리 모두에 닿지 못하고 도달 가능 영역이 몸길이의 2배 미만이면 +500
 *
 * @param position 후보 머리 위치 (보드 안)
 * @param snake 현재 몸통 (머리 → 꼬리)
 * @param food 먹이 위치 (없으면 null)
 * @param size 그리드 크기
 * @returns 벌점 합
 */
export function lookaheadPenalty(
  position: Position,
  snake: SnakeBody,
  food: Position | null,
  size: number,
): number {
  const eating = food !== null && samePosition(position, food);
  const nextBody = [position, ...(eating ? snake : snake.slice(0, -1))];
  const board = encodeBoard(size, nextBody, eating ? null : food);

  let penalty = 0;

  const foodReachable = food === null || canReach(position, food, board);
  if (!foodReachable) penalty += UNREACHABLE_FOOD_PENALTY;

  const tail = nextBody[nextBody.length - 1] ?? position;
  if (!foodReachable && !canReach(position, tail, board)) {
    if (reachableArea(board, position) < nextBody.length * 2) {
      penalty += ISOLATION_PENALTY;
    }
  }

  return penalty;
}

/**
 * 안전 우선 에이전트
 *
 * 탐욕 비용에 이동 후 상태 기준 예측 벌점(`lookaheadPenalty`)을 더합니다.
 * 관측이 없으면 탐욕 비용만으로 선택합니다.
 */
export class SafetyAgent extends SnakeAgent {
  constructor() {
    super('SafetyAgent', true);
  }

  act(candidates: readonly ActionCandidate[], observation?: Observation): Direction {
    let bestDir: Direction | undefined;
    let bestCost = Infinity;

    for (const candidate of candidates) {
      if (candidate.unsafe) continue;
      const cost =
        candidate.totalCost +
        (observation
          ? lookaheadPenalty(candidate.position, observation.snake, observation.food, observation.board.length)
          : 0);
      if (cost < bestCost) {
        bestCost = cost;
        bestDir = candidate.direction;
      }
    }

    if (bestDir === undefined) throw new NoSafeMoveError(this.name);
    return bestDir;
  }
}
