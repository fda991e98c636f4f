import type { Position, SnakeBody } from '@snake-agent/shared';

/**
 * 보드 범위 확인
 *
 * @param position 확인할 위치
 * @param size 그리드 크기
 * @returns [0, size) 범위 안이면 true
 */
export function isOnGrid(position: Position, size: number): boolean {
  return position.x >= 0 && position.x < size && position.y >= 0 && position.y < size;
}

/**
 * 이동 후보 위치의 충돌 여부 판정
 *
 * 보드 밖이거나 몸통과 겹치면 위험합니다.
 * 현재 꼬리 칸은 먹이를 먹지 않는 틱에 비워지므로 안전하게 취급합니다.
 * (먹이는 몸통 위에 놓이지 않으므로 꼬리로 들어가는 틱은 항상 비섭식 틱)
 *
 * @param position 후보 머리 위치
 * @param size 그리드 크기
 * @param snakeBody 현재 몸통 (머리 → 꼬리)
 * @returns 충돌하면 true
 */
export function isUnsafe(position: Position, size: number, snakeBody: SnakeBody): boolean {
  if (!isOnGrid(position, size)) return true;

  // 마지막 세그먼트(꼬리) 제외
  const blocking = snakeBody.length - 1;
  for (let i = 0; i < blocking; i++) {
    const segment = snakeBody[i];
    if (segment !== undefined && segment.x === position.x && segment.y === position.y) {
      return true;
    }
  }
  return false;
}
