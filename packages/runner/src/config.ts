import { z } from 'zod';
import { ConfigError, MIN_GRID_SIZE, parseConfig } from '@snake-agent/shared';
import { AGENT_NAMES, type AgentName } from './agents.js';

type Env = Record<string, string | undefined>;

/**
 * 환경변수 스키마
 * 기본값은 CLI 계층에만 존재하며 컴포넌트에는 명시적으로 전달됩니다.
 */
const envSchema = z.object({
  GRID_SIZE: z.coerce.number().int().min(MIN_GRID_SIZE).default(10),
  MAX_STEPS: z.coerce.number().int().positive().default(500),
  EPISODES: z.coerce.number().int().positive().default(20),
  SEED: z.coerce.number().int().default(0),
  AGENTS: z.string().default('greedy,safety'),
  LOG_LEVEL: z.string().default('info'),
});

/** 실행 설정 */
export interface RunnerConfig {
  readonly size: number;
  readonly maxSteps: number;
  readonly episodes: number;
  readonly seedBase: number;
  readonly agents: readonly AgentName[];
  readonly logLevel: string;
}

/** CLI 플래그 → 환경변수 이름 */
const FLAG_TO_ENV: Readonly<Record<string, keyof z.infer<typeof envSchema>>> = {
  '--size': 'GRID_SIZE',
  '--max-steps': 'MAX_STEPS',
  '--episodes': 'EPISODES',
  '--seed': 'SEED',
  '--agents': 'AGENTS',
  '--log': 'LOG_LEVEL',
};

/**
 * argv에서 플래그 값 추출 (`--flag=value` 또는 `--flag value`)
 */
function getArgValue(argv: readonly string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;
    if (arg === flag) return argv[i + 1];
    if (arg.startsWith(prefix)) return arg.slice(prefix.length);
  }
  return undefined;
}

/**
 * 환경변수 로드 및 검증
 *
 * @param source 환경변수 (기본: process.env)
 * @throws ConfigError 형식이 잘못된 값
 */
export function loadEnv(source: Env = process.env): z.infer<typeof envSchema> {
  return parseConfig(envSchema, source);
}

/**
 * 환경변수와 argv 플래그를 합쳐 실행 설정 생성 (플래그 우선)
 *
 * @param argv 명령행 인자
 * @param env 환경변수
 * @returns 검증된 실행 설정
 * @throws ConfigError 잘못된 값 또는 알 수 없는 에이전트
 */
export function loadConfig(argv: readonly string[], env: Env = process.env): RunnerConfig {
  const merged: Env = { ...env };
  for (const [flag, key] of Object.entries(FLAG_TO_ENV)) {
    const value = getArgValue(argv, flag);
    if (value !== undefined) merged[key] = value;
  }

  const parsed = loadEnv(merged);

  const agentNames = parsed.AGENTS.split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
  const agents = parseConfig(z.array(z.enum(AGENT_NAMES)).nonempty(), agentNames);
  if (new Set(agents).size !== agents.length) {
    throw new ConfigError(['AGENTS: 중복된 에이전트가 있습니다']);
  }

  return {
    size: parsed.GRID_SIZE,
    maxSteps: parsed.MAX_STEPS,
    episodes: parsed.EPISODES,
    seedBase: parsed.SEED,
    agents,
    logLevel: parsed.LOG_LEVEL,
  };
}
