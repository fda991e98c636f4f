import type { EpisodeLogSummary, MetricName, MetricSummary } from '@snake-agent/shared';

/**
 * 실험 로그
 *
 * 에피소드마다 점수와 턴 수를 지표별 시퀀스에 추가합니다.
 * 추가만 가능하며 삭제 연산은 없습니다. 여러 워커의 로그는 `merge`로 사후 병합합니다.
 */
export class ExperimentLog {
  private readonly metrics: Record<MetricName, number[]> = {
    score: [],
    turns: [],
  };

  /**
   * 에피소드 하나의 지표 기록
   *
   * @param score 먹은 먹이 수
   * @param turns 생존 턴 수
   */
  record(score: number, turns: number): void {
    this.metrics.score.push(score);
    this.metrics.turns.push(turns);
  }

  /** 지표별 기록 (읽기 전용) */
  values(metric: MetricName): readonly number[] {
    return this.metrics[metric];
  }

  /** 기록된 에피소드 수 */
  get size(): number {
    return this.metrics.score.length;
  }

  /**
   * 다른 로그의 기록을 뒤에 이어 붙이기
   *
   * @param other 병합할 로그
   * @returns 이 로그
   */
  merge(other: ExperimentLog): this {
    // 자기 자신과 병합해도 끝나도록 시작 시점의 기록을 복사
    const scores = [...other.values('score')];
    const turns = [...other.values('turns')];
    for (let i = 0; i < scores.length; i++) {
      this.record(scores[i] ?? 0, turns[i] ?? 0);
    }
    return this;
  }

  /** 지표별 평균/최댓값/개수 */
  summary(): EpisodeLogSummary {
    return {
      score: summarize(this.metrics.score),
      turns: summarize(this.metrics.turns),
    };
  }
}

function summarize(values: readonly number[]): MetricSummary {
  if (values.length === 0) return { mean: 0, max: 0, count: 0 };

  let sum = 0;
  let max = -Infinity;
  for (const value of values) {
    sum += value;
    if (value > max) max = value;
  }
  return { mean: sum / values.length, max, count: values.length };
}
