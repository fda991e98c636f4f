/** 시드 기반 결정적 난수 (먹이 재배치 재현용) */

/** [0, 1) 실수를 반환하는 난수 소스 */
export type RandomSource = () => number;

/**
 * 부호 없는 32비트 정수로 정규화
 */
function toUint32(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.floor(value) >>> 0;
}

/**
 * xorshift32 난수 생성기
 *
 * @param seed 시드 (0은 1로 대체)
 * @returns [0, 1) 난수 소스
 */
export function createRng(seed: number): RandomSource {
  let state = toUint32(seed) || 1;
  return () => {
    state ^= state << 13;
    state ^= state >>> 17;
    state ^= state << 5;
    return (state >>> 0) / 0x100000000;
  };
}
