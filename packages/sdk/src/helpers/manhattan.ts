import type { Position } from '@snake-agent/shared';

/**
 * 두 위치 간의 맨해튼 거리 계산
 *
 * @param a 첫 번째 위치
 * @param b 두 번째 위치
 * @returns 맨해튼 거리 (칸 수)
 */
export function manhattan(a: Position, b: Position): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}
