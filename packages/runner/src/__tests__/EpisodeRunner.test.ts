import { describe, it, expect, vi } from 'vitest';
import type { ActionCandidate, Direction, EpisodeResult, Observation } from '@snake-agent/shared';
import { ConfigError, InvalidActionError } from '@snake-agent/shared';
import { GreedyAgent, SafetyAgent, SnakeAgent, encodeBoard } from '@snake-agent/sdk';
import { runEpisode, type InitialLayout } from '../EpisodeRunner.js';
import { ExperimentLog } from '../ExperimentLog.js';

/** 10x10, 머리 (5,5) 꼬리 (5,6), 위쪽 진행 */
const CENTER_LAYOUT: InitialLayout = {
  snake: [
    { x: 5, y: 5 },
    { x: 5, y: 6 },
  ],
  direction: 'up',
  food: { x: 2, y: 2 },
};

/** 항상 같은 방향만 고르는 에이전트 */
class FixedAgent extends SnakeAgent {
  constructor(private readonly direction: Direction) {
    super('FixedAgent');
  }

  act(): Direction {
    return this.direction;
  }
}

/** 선택과 관측을 기록하는 탐욕 에이전트 */
class RecordingGreedy extends GreedyAgent {
  readonly choices: Direction[] = [];

  override act(candidates: readonly ActionCandidate[]): Direction {
    const direction = super.act(candidates);
    this.choices.push(direction);
    return direction;
  }
}

/** 관측을 기록하는 에이전트 */
class ObservingAgent extends SnakeAgent {
  readonly observations: (Observation | undefined)[] = [];
  private readonly greedy = new GreedyAgent();

  constructor() {
    super('ObservingAgent', true);
  }

  act(candidates: readonly ActionCandidate[], observation?: Observation): Direction {
    this.observations.push(observation);
    return this.greedy.act(candidates);
  }
}

describe('runEpisode', () => {
  it('중앙 배치에서 탐욕 에이전트가 6스텝 만에 먹이를 먹고 타임아웃', () => {
    const agent = new RecordingGreedy();
    const result = runEpisode({ size: 10, maxSteps: 6, seed: 1 }, agent, { initial: CENTER_LAYOUT });

    expect(agent.choices).toEqual(['up', 'up', 'up', 'left', 'left', 'left']);
    expect(result).toEqual({ score: 1, turns: 6, outcome: 'timeout', seed: 1 });
  });

  it('벽으로 직진하면 collided (원인 wall)', () => {
    const result = runEpisode({ size: 5, maxSteps: 100, seed: 0 }, new FixedAgent('up'), {
      initial: { food: { x: 4, y: 4 } },
    });

    expect(result).toEqual({ score: 0, turns: 2, outcome: 'collided', seed: 0, cause: 'wall' });
  });

  it('갇힌 스네이크는 collided (원인 boxed-in)', () => {
    const result = runEpisode({ size: 3, maxSteps: 10, seed: 0 }, new GreedyAgent(), {
      initial: {
        snake: [
          { x: 0, y: 0 },
          { x: 1, y: 0 },
          { x: 1, y: 1 },
          { x: 0, y: 1 },
          { x: 0, y: 2 },
          { x: 1, y: 2 },
        ],
        direction: 'left',
        food: { x: 2, y: 2 },
      },
    });

    expect(result).toEqual({ score: 0, turns: 0, outcome: 'collided', seed: 0, cause: 'boxed-in' });
  });

  it('보드를 가득 채우면 completed', () => {
    const result = runEpisode({ size: 2, maxSteps: 10, seed: 0 }, new GreedyAgent(), {
      initial: {
        snake: [
          { x: 0, y: 0 },
          { x: 1, y: 0 },
          { x: 1, y: 1 },
        ],
        direction: 'left',
        food: { x: 0, y: 1 },
      },
    });

    expect(result).toEqual({ score: 1, turns: 1, outcome: 'completed', seed: 0 });
  });

  it('1x1 보드는 첫 틱 전에 completed', () => {
    const agent = new GreedyAgent();
    const actSpy = vi.spyOn(agent, 'act');

    expect(runEpisode({ size: 1, maxSteps: 10, seed: 0 }, agent)).toEqual({
      score: 0,
      turns: 0,
      outcome: 'completed',
      seed: 0,
    });
    expect(actSpy).not.toHaveBeenCalled();
  });

  it('플래너 가중치가 선택에 반영', () => {
    const initial: InitialLayout = { ...CENTER_LAYOUT, food: { x: 2, y: 5 } };

    const simple = new RecordingGreedy();
    runEpisode({ size: 10, maxSteps: 1, seed: 0 }, simple, { initial });
    expect(simple.choices).toEqual(['left']);

    const turnAverse = new RecordingGreedy();
    runEpisode({ size: 10, maxSteps: 1, seed: 0 }, turnAverse, { initial, weights: { distance: 1, turn: 5 } });
    expect(turnAverse.choices).toEqual(['up']);
  });

  it('perceives 에이전트에만 보드 관측 전달', () => {
    const observer = new ObservingAgent();
    runEpisode({ size: 10, maxSteps: 2, seed: 0 }, observer, { initial: CENTER_LAYOUT });

    expect(observer.observations).toHaveLength(2);
    expect(observer.observations[0]).toEqual({
      board: encodeBoard(
        10,
        [
          { x: 5, y: 5 },
          { x: 5, y: 6 },
        ],
        { x: 2, y: 2 },
      ),
      snake: [
        { x: 5, y: 5 },
        { x: 5, y: 6 },
      ],
      food: { x: 2, y: 2 },
      tick: 0,
    });
    expect(observer.observations[1]?.tick).toBe(1);

    const actSpy = vi.spyOn(GreedyAgent.prototype, 'act');
    runEpisode({ size: 10, maxSteps: 1, seed: 0 }, new GreedyAgent(), { initial: CENTER_LAYOUT });
    expect(actSpy).toHaveBeenCalledTimes(1);
    expect(actSpy.mock.calls[0]).toEqual([expect.any(Array), undefined]);
    actSpy.mockRestore();
  });

  it('생명주기 훅과 로그 기록', () => {
    const agent = new GreedyAgent();
    const onStart = vi.fn<(seed: number) => void>();
    const onEnd = vi.fn<(result: EpisodeResult) => void>();
    agent.onEpisodeStart = onStart;
    agent.onEpisodeEnd = onEnd;
    const log = new ExperimentLog();

    const result = runEpisode({ size: 10, maxSteps: 6, seed: 9 }, agent, { initial: CENTER_LAYOUT, log });

    expect(onStart).toHaveBeenCalledWith(9);
    expect(onEnd).toHaveBeenCalledWith(result);
    expect(log.values('score')).toEqual([1]);
    expect(log.values('turns')).toEqual([6]);
  });

  it('잘못된 설정은 틱 실행 전에 ConfigError', () => {
    const agent = new GreedyAgent();
    const actSpy = vi.spyOn(agent, 'act');

    expect(() => runEpisode({ size: 0, maxSteps: 10, seed: 0 }, agent)).toThrow(ConfigError);
    expect(() => runEpisode({ size: 10, maxSteps: 0, seed: 0 }, agent)).toThrow(ConfigError);
    expect(() => runEpisode({ size: 10, maxSteps: 10, seed: 0.5 }, agent)).toThrow(ConfigError);
    expect(actSpy).not.toHaveBeenCalled();
  });

  it('행동 공간 밖의 방향은 InvalidActionError로 전파', () => {
    class RogueAgent extends SnakeAgent {
      constructor() {
        super('RogueAgent');
      }

      act(): Direction {
        return JSON.parse('"north"');
      }
    }

    expect(() => runEpisode({ size: 10, maxSteps: 10, seed: 0 }, new RogueAgent())).toThrow(InvalidActionError);
  });

  it('같은 시드는 같은 결과', () => {
    const a = runEpisode({ size: 6, maxSteps: 80, seed: 42 }, new SafetyAgent());
    const b = runEpisode({ size: 6, maxSteps: 80, seed: 42 }, new SafetyAgent());
    expect(a).toEqual(b);
  });
});
