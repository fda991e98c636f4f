/**
 * 스네이크 에이전트 공유 타입 정의
 *
 * 환경(GridWorld), 플래너, 정책, 실험 로그가 함께 사용하는 데이터 모델입니다.
 */

/** 이동 방향 (닫힌 행동 공간, 정확히 4개) */
export type Direction = 'up' | 'down' | 'left' | 'right';

/** 현재 방향 기준 상대 행동 */
export type RelativeAction = 'straight' | 'left' | 'right';

/** 그리드 좌표 (좌상단 원점, x는 오른쪽, y는 아래쪽으로 증가) */
export interface Position {
  readonly x: number;
  readonly y: number;
}

/** 스네이크 몸통 (머리가 첫 번째, 꼬리가 마지막) */
export type SnakeBody = readonly Position[];

/** 보드 셀 값: 0 빈칸, 1 스네이크, 2 먹이 */
export type CellValue = 0 | 1 | 2;

/** size×size 보드 인코딩 ([y][x] 인덱싱) */
export type Board = readonly (readonly CellValue[])[];

/** 한 틱의 결과 */
export type StepOutcome = 'continue' | 'ate' | 'collided';

/** 충돌 원인 */
export type CollisionCause = 'wall' | 'self' | 'boxed-in';

/** 에피소드 종료 결과 */
export type EpisodeOutcome = 'collided' | 'timeout' | 'completed';

/** 플래너가 틱마다 생성하는 행동 후보 */
export interface ActionCandidate {
  /** 후보 방향 */
  readonly direction: Direction;
  /** 이동 후 머리 위치 (보드 밖일 수 있음) */
  readonly position: Position;
  /** 먹이까지의 맨해튼 거리 */
  readonly distance: number;
  /** 방향 전환 비용 (직진 0, 전환 1) */
  readonly turnCost: number;
  /** 가중 합산 비용 */
  readonly totalCost: number;
  /** 경계 또는 몸통 충돌 여부 */
  readonly unsafe: boolean;
}

/** 거리와 방향 전환 비용의 가중치 */
export interface PlannerWeights {
  readonly distance: number;
  readonly turn: number;
}

/** 정책에 전달되는 관측 (perceives 에이전트 전용) */
export interface Observation {
  /** 현재 보드 인코딩 */
  readonly board: Board;
  /** 현재 몸통 (머리 → 꼬리) */
  readonly snake: SnakeBody;
  /** 먹이 위치 (보드가 가득 차면 null) */
  readonly food: Position | null;
  /** 에피소드 내 틱 번호 */
  readonly tick: number;
}

/** GridWorld 상태 스냅샷 */
export interface WorldSnapshot {
  readonly size: number;
  readonly snake: SnakeBody;
  readonly direction: Direction;
  /** 보드가 가득 차면 null */
  readonly food: Position | null;
  readonly score: number;
  readonly done: boolean;
}

/** 단일 에피소드 설정 */
export interface EpisodeConfig {
  readonly size: number;
  readonly maxSteps: number;
  readonly seed: number;
}

/** 배치 실행 설정 */
export interface BatchConfig {
  readonly episodes: number;
  readonly size: number;
  readonly maxSteps: number;
  readonly seedBase: number;
}

/** 에피소드 결과 */
export interface EpisodeResult {
  /** 먹은 먹이 수 */
  readonly score: number;
  /** 충돌 없이 적용된 틱 수 */
  readonly turns: number;
  readonly outcome: EpisodeOutcome;
  readonly seed: number;
  /** outcome이 collided일 때만 존재 */
  readonly cause?: CollisionCause;
}

/** 실험 로그 지표 이름 */
export type MetricName = 'score' | 'turns';

/** 지표별 집계 */
export interface MetricSummary {
  readonly mean: number;
  readonly max: number;
  readonly count: number;
}

/** 실험 로그 집계 */
export type EpisodeLogSummary = Readonly<Record<MetricName, MetricSummary>>;

/** 배치 실행 집계 */
export interface BatchSummary {
  readonly agent: string;
  readonly metrics: EpisodeLogSummary;
  readonly outcomes: Readonly<Record<EpisodeOutcome, number>>;
  readonly results: readonly EpisodeResult[];
}
