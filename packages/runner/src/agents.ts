import { GreedyAgent, SafetyAgent } from '@snake-agent/sdk';
import type { SnakeAgent } from '@snake-agent/sdk';

/** 내장 에이전트 이름 */
export const AGENT_NAMES: readonly ['greedy', 'safety'] = ['greedy', 'safety'];

export type AgentName = (typeof AGENT_NAMES)[number];

const FACTORIES: Readonly<Record<AgentName, () => SnakeAgent>> = {
  greedy: () => new GreedyAgent(),
  safety: () => new SafetyAgent(),
};

/** 이름으로 내장 에이전트 생성 */
export function createAgent(name: AgentName): SnakeAgent {
  return FACTORIES[name]();
}
