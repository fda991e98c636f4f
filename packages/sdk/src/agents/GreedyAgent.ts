import { SnakeAgent } from '../SnakeAgent.js';
import type { ActionCandidate, Direction } from '@snake-agent/shared';
import { NoSafeMoveError } from '@snake-agent/shared';

/**
 * 탐욕 에이전트
 *
 * 위험한 후보를 제외하고 총 비용이 가장 작은 방향을 고릅니다.
 * 동점이면 열거 순서(up, down, left, right)상 앞선 방향을 선택합니다.
 */
export class GreedyAgent extends SnakeAgent {
  constructor() {
    super('GreedyAgent');
  }

  act(candidates: readonly ActionCandidate[]): Direction {
    let best: ActionCandidate | undefined;

    for (const candidate of candidates) {
      if (candidate.unsafe) continue;
      // 엄격한 비교로 먼저 나온 후보 유지
      if (best === undefined || candidate.totalCost < best.totalCost) {
        best = candidate;
      }
    }

    if (best === undefined) throw new NoSafeMoveError(this.name);
    return best.direction;
  }
}
