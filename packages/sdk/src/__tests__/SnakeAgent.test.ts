import { describe, it, expect } from 'vitest';
import type { ActionCandidate, Direction, EpisodeResult } from '@snake-agent/shared';
import { SnakeAgent } from '../SnakeAgent.js';
import { GreedyAgent } from '../agents/GreedyAgent.js';

/** 직진만 하는 테스트 에이전트 */
class StraightAgent extends SnakeAgent {
  readonly seeds: number[] = [];
  readonly results: EpisodeResult[] = [];

  constructor() {
    super('StraightAgent');
  }

  act(candidates: readonly ActionCandidate[]): Direction {
    const straight = candidates.find((c) => c.turnCost === 0 && !c.unsafe);
    return straight?.direction ?? 'up';
  }

  override onEpisodeStart(seed: number): void {
    this.seeds.push(seed);
  }

  override onEpisodeEnd(result: EpisodeResult): void {
    this.results.push(result);
  }
}

describe('SnakeAgent', () => {
  it('기본적으로 관측을 받지 않음', () => {
    const agent = new StraightAgent();
    expect(agent.name).toBe('StraightAgent');
    expect(agent.perceives).toBe(false);
  });

  it('하위 클래스의 act 호출', () => {
    const agent = new StraightAgent();
    const candidates: ActionCandidate[] = [
      { direction: 'up', position: { x: 1, y: 0 }, distance: 3, turnCost: 1, totalCost: 4, unsafe: false },
      { direction: 'down', position: { x: 1, y: 2 }, distance: 1, turnCost: 1, totalCost: 2, unsafe: false },
      { direction: 'left', position: { x: 0, y: 1 }, distance: 2, turnCost: 0, totalCost: 2, unsafe: false },
      { direction: 'right', position: { x: 2, y: 1 }, distance: 2, turnCost: 1, totalCost: 3, unsafe: false },
    ];
    expect(agent.act(candidates)).toBe('left');
  });

  it('생명주기 훅 구현', () => {
    const agent = new StraightAgent();
    agent.onEpisodeStart(7);
    agent.onEpisodeEnd({ score: 2, turns: 10, outcome: 'timeout', seed: 7 });
    expect(agent.seeds).toEqual([7]);
    expect(agent.results).toEqual([{ score: 2, turns: 10, outcome: 'timeout', seed: 7 }]);
  });

  it('훅은 선택 구현', () => {
    const agent = new GreedyAgent();
    expect(agent.onEpisodeStart).toBeUndefined();
    expect(agent.onEpisodeEnd).toBeUndefined();
  });
});
