import { describe, it, expect } from 'vitest';
import { ExperimentLog } from '../ExperimentLog.js';

describe('ExperimentLog', () => {
  it('빈 로그의 요약은 0', () => {
    const log = new ExperimentLog();
    expect(log.size).toBe(0);
    expect(log.summary()).toEqual({
      score: { mean: 0, max: 0, count: 0 },
      turns: { mean: 0, max: 0, count: 0 },
    });
  });

  it('record는 두 지표에 모두 추가', () => {
    const log = new ExperimentLog();
    log.record(2, 40);
    log.record(5, 100);
    log.record(1, 10);

    expect(log.size).toBe(3);
    expect(log.values('score')).toEqual([2, 5, 1]);
    expect(log.values('turns')).toEqual([40, 100, 10]);
  });

  it('평균, 최댓값, 개수 요약', () => {
    const log = new ExperimentLog();
    log.record(2, 40);
    log.record(5, 100);
    log.record(1, 10);

    expect(log.summary()).toEqual({
      score: { mean: 8 / 3, max: 5, count: 3 },
      turns: { mean: 50, max: 100, count: 3 },
    });
  });

  it('merge는 다른 로그의 기록을 순서대로 이어 붙임', () => {
    const a = new ExperimentLog();
    a.record(1, 10);
    const b = new ExperimentLog();
    b.record(3, 30);
    b.record(4, 40);

    expect(a.merge(b)).toBe(a);
    expect(a.values('score')).toEqual([1, 3, 4]);
    expect(a.values('turns')).toEqual([10, 30, 40]);
    expect(b.size).toBe(2);
  });

  it('자기 자신과 병합하면 기존 기록이 한 번 더 추가', () => {
    const log = new ExperimentLog();
    log.record(1, 2);
    log.record(3, 4);

    log.merge(log);

    expect(log.size).toBe(4);
    expect(log.values('score')).toEqual([1, 3, 1, 3]);
    expect(log.values('turns')).toEqual([2, 4, 2, 4]);
  });
});
