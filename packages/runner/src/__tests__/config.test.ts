import { describe, it, expect } from 'vitest';
import { ConfigError } from '@snake-agent/shared';
import { loadConfig, loadEnv } from '../config.js';
import { main } from '../cli.js';
import { resolveLogLevel } from '../logger.js';

describe('loadConfig', () => {
  it('기본값', () => {
    expect(loadConfig([], {})).toEqual({
      size: 10,
      maxSteps: 500,
      episodes: 20,
      seedBase: 0,
      agents: ['greedy', 'safety'],
      logLevel: 'info',
    });
  });

  it('환경변수 값 사용', () => {
    const config = loadConfig([], { GRID_SIZE: '12', MAX_STEPS: '50', SEED: '-3', AGENTS: 'safety' });
    expect(config.size).toBe(12);
    expect(config.maxSteps).toBe(50);
    expect(config.seedBase).toBe(-3);
    expect(config.agents).toEqual(['safety']);
  });

  it('플래그가 환경변수보다 우선', () => {
    const config = loadConfig(['--size=8', '--episodes', '5', '--log=debug'], { GRID_SIZE: '12', EPISODES: '9' });
    expect(config.size).toBe(8);
    expect(config.episodes).toBe(5);
    expect(config.logLevel).toBe('debug');
  });

  it('에이전트 목록의 공백과 빈 항목 무시', () => {
    expect(loadConfig([], { AGENTS: ' greedy , ' }).agents).toEqual(['greedy']);
  });

  it('잘못된 값은 ConfigError', () => {
    expect(() => loadConfig([], { GRID_SIZE: '0' })).toThrow(ConfigError);
    expect(() => loadConfig([], { MAX_STEPS: 'abc' })).toThrow(ConfigError);
    expect(() => loadConfig([], { EPISODES: '0' })).toThrow(ConfigError);
    expect(() => loadConfig(['--seed=1.5'], {})).toThrow(ConfigError);
  });

  it('알 수 없는, 중복된, 빈 에이전트 목록은 ConfigError', () => {
    expect(() => loadConfig([], { AGENTS: 'greedy,random' })).toThrow(ConfigError);
    expect(() => loadConfig([], { AGENTS: 'greedy,greedy' })).toThrow(ConfigError);
    expect(() => loadConfig([], { AGENTS: '' })).toThrow(ConfigError);
  });

  it('ConfigError는 위반 항목을 담음', () => {
    try {
      loadEnv({ GRID_SIZE: '0' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.code).toBe('CONFIG_ERROR');
        expect(error.issues).toHaveLength(1);
        expect(error.issues[0]?.startsWith('GRID_SIZE: ')).toBe(true);
      }
    }
  });
});

describe('resolveLogLevel', () => {
  it('대소문자 무시', () => {
    expect(resolveLogLevel('DEBUG')).toBe('debug');
    expect(resolveLogLevel(' silent ')).toBe('silent');
  });

  it('알 수 없거나 없으면 info', () => {
    expect(resolveLogLevel('verbose')).toBe('info');
    expect(resolveLogLevel(undefined)).toBe('info');
  });
});

describe('main', () => {
  it('설정된 에이전트별 배치 요약 반환', () => {
    const summaries = main(['--episodes=2', '--max-steps=3', '--agents=greedy'], { LOG_LEVEL: 'silent' });

    expect(Object.keys(summaries)).toEqual(['GreedyAgent']);
    expect(summaries['GreedyAgent']?.results.map((r) => r.seed)).toEqual([0, 1]);
  });

  it('잘못된 설정은 실행 전에 ConfigError', () => {
    expect(() => main(['--agents=unknown'], { LOG_LEVEL: 'silent' })).toThrow(ConfigError);
  });
});
