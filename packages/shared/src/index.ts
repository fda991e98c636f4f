/** 스네이크 에이전트 공유 모듈 진입점 */
export * from './types.js';
export * from './constants.js';
export * from './errors.js';
export * from './schemas.js';
