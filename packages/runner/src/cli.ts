import type { BatchSummary } from '@snake-agent/shared';
import { createAgent } from './agents.js';
import { compareAgents } from './BatchRunner.js';
import { loadConfig } from './config.js';
import { createLogger, resolveLogLevel, setLogLevel } from './logger.js';

const logger = createLogger('snake-agent');

/**
 * 설정된 에이전트들을 같은 시드로 배치 실행하고 요약을 로깅
 *
 * @param argv 명령행 인자 (`--size=12` 등)
 * @param env 환경변수
 * @returns 에이전트별 배치 집계
 */
export function main(
  argv: readonly string[] = process.argv.slice(2),
  env: Record<string, string | undefined> = process.env,
): Record<string, BatchSummary> {
  const config = loadConfig(argv, env);
  setLogLevel(resolveLogLevel(config.logLevel));

  const summaries = compareAgents(
    {
      episodes: config.episodes,
      size: config.size,
      maxSteps: config.maxSteps,
      seedBase: config.seedBase,
    },
    config.agents.map(createAgent),
  );

  for (const summary of Object.values(summaries)) {
    logger.info(
      {
        agent: summary.agent,
        score: summary.metrics.score,
        turns: summary.metrics.turns,
        outcomes: summary.outcomes,
      },
      'Agent summary',
    );
  }

  return summaries;
}
