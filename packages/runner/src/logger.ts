import pino, { type Logger, type LevelWithSilent } from 'pino';

/** 허용 로그 레벨 */
const LOG_LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

/** 생성된 모듈 로거 (레벨 일괄 변경용) */
const loggers = new Set<Logger>();

/**
 * LOG_LEVEL 값을 pino 레벨로 해석
 * 알 수 없는 값이면 info를 사용합니다.
 */
export function resolveLogLevel(raw: string | undefined): LevelWithSilent {
  const level = raw?.trim().toLowerCase();
  return LOG_LEVELS.find((candidate) => candidate === level) ?? 'info';
}

/**
 * 모듈별 로거 생성
 *
 * @param name 모듈 이름 (로그의 name 필드)
 */
export function createLogger(name: string): Logger {
  const logger = pino({ name, level: resolveLogLevel(process.env['LOG_LEVEL']) });
  loggers.add(logger);
  return logger;
}

/** 모든 모듈 로거의 레벨 변경 */
export function setLogLevel(level: LevelWithSilent): void {
  for (const logger of loggers) {
    logger.level = level;
  }
}
