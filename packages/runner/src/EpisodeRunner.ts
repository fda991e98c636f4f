/**
 * 에피소드 실행기
 * 틱마다 (인코딩) → 후보 계획(안전 검사 포함) → 정책 선택 → step 순서로 진행하고
 * 충돌/타임아웃/완주 중 하나로 종료합니다.
 */
import type {
  Direction,
  EpisodeConfig,
  EpisodeResult,
  Observation,
  PlannerWeights,
  Position,
  SnakeBody,
} from '@snake-agent/shared';
import { EpisodeConfigSchema, NoSafeMoveError, parseConfig } from '@snake-agent/shared';
import { GridWorld, encodeBoard, planActions } from '@snake-agent/sdk';
import type { SnakeAgent } from '@snake-agent/sdk';
import type { ExperimentLog } from './ExperimentLog.js';
import { createLogger } from './logger.js';

const logger = createLogger('episode-runner');

/** 시나리오 재현용 초기 배치 */
export interface InitialLayout {
  readonly snake?: SnakeBody;
  readonly direction?: Direction;
  readonly food?: Position | null;
}

/** 에피소드 실행 옵션 */
export interface RunEpisodeOptions {
  /** 플래너 가중치 (기본: 거리 + 전환 단순 합) */
  readonly weights?: PlannerWeights;
  /** 결과를 기록할 실험 로그 */
  readonly log?: ExperimentLog;
  /** 기본 시작 배치 대신 사용할 배치 */
  readonly initial?: InitialLayout;
}

/**
 * 에피소드 하나를 끝까지 실행
 *
 * 충돌(경계/자기 몸/갇힘), 스텝 한도 도달, 보드 완주는 모두 정상 종료로서
 * 결과에 담깁니다. ConfigError와 InvalidActionError만 예외로 전파됩니다.
 *
 * @param config 그리드 크기, 최대 스텝, 시드
 * @param agent 의사결정 에이전트
 * @param options 가중치, 로그, 초기 배치
 * @returns 에피소드 결과
 */
export function runEpisode(
  config: EpisodeConfig,
  agent: SnakeAgent,
  options: RunEpisodeOptions = {},
): EpisodeResult {
  const { size, maxSteps, seed } = parseConfig(EpisodeConfigSchema, config);
  const world = new GridWorld({ size, seed, ...options.initial });

  agent.onEpisodeStart?.(seed);
  const result = playEpisode(world, agent, maxSteps, seed, options.weights);

  options.log?.record(result.score, result.turns);
  agent.onEpisodeEnd?.(result);

  logger.debug(
    { agent: agent.name, seed, score: result.score, turns: result.turns, outcome: result.outcome },
    'Episode finished',
  );

  return result;
}

/**
 * 종료 조건에 도달할 때까지 틱 반복
 */
function playEpisode(
  world: GridWorld,
  agent: SnakeAgent,
  maxSteps: number,
  seed: number,
  weights: PlannerWeights | undefined,
): EpisodeResult {
  for (let turns = 0; ; turns++) {
    if (world.isFilled()) {
      return { score: world.currentScore(), turns, outcome: 'completed', seed };
    }
    if (turns >= maxSteps) {
      return { score: world.currentScore(), turns, outcome: 'timeout', seed };
    }

    const food = world.foodPosition();
    const body = world.body();
    const observation: Observation | undefined = agent.perceives
      ? { board: encodeBoard(world.size, body, food), snake: body, food, tick: turns }
      : undefined;
    const candidates = planActions(world.head(), food, body, world.currentDirection(), world.size, weights);

    let direction: Direction;
    try {
      direction = agent.act(candidates, observation);
    } catch (error) {
      // 갇힘은 에피소드 종료 신호, 그 외는 호출자에게 전파
      if (!(error instanceof NoSafeMoveError)) throw error;
      return { score: world.currentScore(), turns, outcome: 'collided', seed, cause: 'boxed-in' };
    }

    if (world.step(direction) === 'collided') {
      const cause = world.lastCollision()?.cause ?? 'self';
      return { score: world.currentScore(), turns, outcome: 'collided', seed, cause };
    }
  }
}
