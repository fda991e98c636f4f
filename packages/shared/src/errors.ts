/**
 * 스네이크 에이전트 기본 에러
 * 모든 도메인 에러는 이 클래스를 확장합니다.
 */
export class SnakeAgentError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = 'SnakeAgentError';
  }
}

/**
 * 행동 공간 밖의 방향 요청
 * 호출자는 진행하면 안 됩니다.
 */
export class InvalidActionError extends SnakeAgentError {
  constructor(public readonly action: unknown) {
    super(`유효하지 않은 행동: ${String(action)}`, 'INVALID_ACTION');
    this.name = 'InvalidActionError';
  }
}

/**
 * 안전한 후보가 하나도 없음 (갇힘)
 * 시스템 오류가 아니라 에피소드 종료 신호입니다.
 */
export class NoSafeMoveError extends SnakeAgentError {
  constructor(public readonly agent: string) {
    super(`${agent}: 안전한 이동이 없습니다`, 'NO_SAFE_MOVE');
    this.name = 'NoSafeMoveError';
  }
}

/** 잘못된 설정 (틱 실행 전에 거부) */
export class ConfigError extends SnakeAgentError {
  constructor(public readonly issues: readonly string[]) {
    super(`잘못된 설정: ${issues.join('; ')}`, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

/** 종료된 에피소드에서 step 호출 */
export class EpisodeEndedError extends SnakeAgentError {
  constructor() {
    super('에피소드가 이미 종료되었습니다', 'EPISODE_ENDED');
    this.name = 'EpisodeEndedError';
  }
}
