/**
 * 배치 실행기
 * 같은 설정으로 여러 에피소드를 순차 실행하고 정책 간 비교용 집계를 만듭니다.
 * 에피소드 i는 시드 seedBase + i를 사용하므로 배치는 재현 가능합니다.
 */
import type { BatchConfig, BatchSummary, EpisodeOutcome, EpisodeResult } from '@snake-agent/shared';
import { BatchConfigSchema, ConfigError, parseConfig } from '@snake-agent/shared';
import type { SnakeAgent } from '@snake-agent/sdk';
import { ExperimentLog } from './ExperimentLog.js';
import { runEpisode, type RunEpisodeOptions } from './EpisodeRunner.js';
import { createLogger } from './logger.js';

const logger = createLogger('batch-runner');

/** 배치 실행 옵션 (로그는 인자로 별도 전달) */
export type RunBatchOptions = Omit<RunEpisodeOptions, 'log'>;

/**
 * 에피소드 배치 실행
 *
 * @param config 에피소드 수, 그리드 크기, 최대 스텝, 기준 시드
 * @param agent 의사결정 에이전트
 * @param log 결과를 기록할 실험 로그 (기본: 새 로그)
 * @param options 가중치, 초기 배치
 * @returns 배치 집계
 */
export function runBatch(
  config: BatchConfig,
  agent: SnakeAgent,
  log: ExperimentLog = new ExperimentLog(),
  options: RunBatchOptions = {},
): BatchSummary {
  const { episodes, size, maxSteps, seedBase } = parseConfig(BatchConfigSchema, config);

  logger.info({ agent: agent.name, episodes, size, maxSteps, seedBase }, 'Batch started');

  const results: EpisodeResult[] = [];
  const outcomes: Record<EpisodeOutcome, number> = { collided: 0, timeout: 0, completed: 0 };

  for (let i = 0; i < episodes; i++) {
    const result = runEpisode({ size, maxSteps, seed: seedBase + i }, agent, { ...options, log });
    results.push(result);
    outcomes[result.outcome] += 1;
  }

  const metrics = log.summary();
  logger.info({ agent: agent.name, metrics, outcomes }, 'Batch completed');

  return { agent: agent.name, metrics, outcomes, results };
}

/**
 * 여러 에이전트를 같은 설정/시드로 실행해 비교
 *
 * @param config 배치 설정
 * @param agents 비교할 에이전트 (이름이 키가 되므로 중복 불가)
 * @returns 에이전트 이름별 배치 집계
 * @throws ConfigError 이름이 중복된 에이전트
 */
export function compareAgents(
  config: BatchConfig,
  agents: readonly SnakeAgent[],
  options: RunBatchOptions = {},
): Record<string, BatchSummary> {
  const names = agents.map((agent) => agent.name);
  const duplicates = names.filter((name, i) => names.indexOf(name) !== i);
  if (duplicates.length > 0) {
    throw new ConfigError([`agents: 중복된 에이전트 이름 ${[...new Set(duplicates)].join(', ')}`]);
  }

  const summaries: Record<string, BatchSummary> = {};
  for (const agent of agents) {
    summaries[agent.name] = runBatch(config, agent, new ExperimentLog(), options);
  }
  return summaries;
}
