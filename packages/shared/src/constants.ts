import type { CellValue, Direction, PlannerWeights, Position, RelativeAction } from './types.js';

/** 방향 열거 순서 (후보 정렬과 동점 처리 기준) */
export const DIRECTIONS: readonly ['up', 'down', 'left', 'right'] = ['up', 'down', 'left', 'right'];

/** 방향별 이동 벡터 */
export const DIRECTION_VECTORS: Readonly<Record<Direction, Position>> = {
  up: { x: 0, y: -1 },
  down: { x: 0, y: 1 },
  left: { x: -1, y: 0 },
  right: { x: 1, y: 0 },
};

/** 상대 행동 → 절대 방향 변환표 */
export const RELATIVE_TURNS: Readonly<Record<Direction, Readonly<Record<RelativeAction, Direction>>>> = {
  up: { straight: 'up', left: 'left', right: 'right' },
  down: { straight: 'down', left: 'right', right: 'left' },
  left: { straight: 'left', left: 'down', right: 'up' },
  right: { straight: 'right', left: 'up', right: 'down' },
};

/** 보드 셀 값 */
export const CELL = {
  EMPTY: 0,
  SNAKE: 1,
  FOOD: 2,
} as const satisfies Record<string, CellValue>;

/** 최소 그리드 크기 (머리 한 칸) */
export const MIN_GRID_SIZE = 1;

/** 기본 플래너 가중치 (단순 합) */
export const DEFAULT_PLANNER_WEIGHTS: PlannerWeights = {
  distance: 1,
  turn: 1,
};
