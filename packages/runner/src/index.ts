/**
 * @snake-agent/runner
 * 에피소드/배치 실행기와 실험 로그
 */
export { runEpisode } from './EpisodeRunner.js';
export { runBatch, compareAgents } from './BatchRunner.js';
export { ExperimentLog } from './ExperimentLog.js';
export { loadConfig, loadEnv } from './config.js';
export { createAgent, AGENT_NAMES } from './agents.js';
export { main } from './cli.js';

export type { RunEpisodeOptions, InitialLayout } from './EpisodeRunner.js';
export type { RunBatchOptions } from './BatchRunner.js';
export type { RunnerConfig } from './config.js';
export type { AgentName } from './agents.js';
