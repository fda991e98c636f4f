import type { Direction, RelativeAction } from '@snake-agent/shared';
import { RELATIVE_TURNS } from '@snake-agent/shared';

/**
 * 상대 행동(직진/좌회전/우회전)을 절대 방향으로 변환
 *
 * @param current 현재 진행 방향
 * @param action 상대 행동
 * @returns 절대 방향
 */
export function toAbsoluteDirection(current: Direction, action: RelativeAction): Direction {
  return RELATIVE_TURNS[current][action];
}
