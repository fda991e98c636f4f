/**
 * @snake-agent/sdk
 * 규칙 기반 스네이크 에이전트 개발 키트
 *
 * 그리드 환경, 보드 인코딩, 안전 검사, 행동 후보 플래너와
 * 교체 가능한 정책(에이전트) 인터페이스를 제공합니다.
 *
 * @example
 * ```typescript
 * import { GridWorld, GreedyAgent, planActions } from '@snake-agent/sdk';
 *
 * const world = new GridWorld({ size: 10, seed: 1 });
 * const agent = new GreedyAgent();
 * const food = world.foodPosition();
 * const candidates = planActions(world.head(), food, world.body(), world.currentDirection(), world.size);
 * world.step(agent.act(candidates));
 * ```
 */

export { SnakeAgent } from './SnakeAgent.js';
export { GridWorld } from './GridWorld.js';
export { manhattan } from './helpers/manhattan.js';
export { isUnsafe, isOnGrid } from './helpers/isUnsafe.js';
export { planActions } from './helpers/planActions.js';
export { encodeBoard } from './helpers/encodeBoard.js';
export { pathfind } from './helpers/pathfind.js';
export { reachableArea } from './helpers/reachableArea.js';
export { toAbsoluteDirection } from './helpers/relativeTurn.js';
export { createRng } from './helpers/random.js';

// 샘플 에이전트
export { GreedyAgent } from './agents/GreedyAgent.js';
export { SafetyAgent, lookaheadPenalty } from './agents/SafetyAgent.js';

// 공유 타입 재수출
export type {
  ActionCandidate,
  Board,
  Direction,
  EpisodeResult,
  Observation,
  PlannerWeights,
  Position,
  SnakeBody,
  StepOutcome,
  WorldSnapshot,
} from '@snake-agent/shared';

// SDK 전용 타입
export type { GridWorldOptions, CollisionInfo } from './GridWorld.js';
export type { RandomSource } from './helpers/random.js';
