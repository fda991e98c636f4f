import type { ActionCandidate, Direction, EpisodeResult, Observation } from '@snake-agent/shared';

/**
 * 스네이크 에이전트(정책) 추상 클래스
 *
 * 새로운 의사결정 방식을 만들려면 이 클래스를 확장하고
 * `act` 메서드를 구현하세요. 에이전트는 플래너가 만든 행동 후보만 보며
 * GridWorld 내부 상태에는 접근하지 않습니다.
 *
 * 보드 인코딩이 필요한 에이전트(예: 학습된 점수 함수)는 `perceives`를
 * true로 설정하면 매 틱 `observation`을 함께 받습니다.
 *
 * @example
 * ```typescript
 * class StraightAgent extends SnakeAgent {
 *   act(candidates: readonly ActionCandidate[]): Direction {
 *     const straight = candidates.find((c) => c.turnCost === 0 && !c.unsafe);
 *     return straight?.direction ?? 'up';
 *   }
 * }
 * ```
 */
export abstract class SnakeAgent {
  /** 에이전트 이름 (실험 로그 비교 키) */
  readonly name: string;

  /** true이면 러너가 매 틱 보드 인코딩을 전달 */
  readonly perceives: boolean;

  /**
   * 에이전트 생성
   * @param name 에이전트 이름
   * @param perceives 보드 인코딩 수신 여부
   */
  constructor(name: string, perceives = false) {
    this.name = name;
    this.perceives = perceives;
  }

  /**
   * 행동 후보 중 하나를 선택 (필수 구현)
   *
   * @param candidates DIRECTIONS 순서의 행동 후보
   * @param observation 보드 관측 (perceives 에이전트에만 전달)
   * @returns 선택한 방향
   * @throws NoSafeMoveError 안전한 후보가 없을 때
   */
  abstract act(candidates: readonly ActionCandidate[], observation?: Observation): Direction;

  /**
   * 에피소드 시작 알림 (선택 구현)
   * @param seed 에피소드 시드
   */
  onEpisodeStart?(seed: number): void;

  /**
   * 에피소드 종료 알림 (선택 구현)
   * @param result 에피소드 결과
   */
  onEpisodeEnd?(result: EpisodeResult): void;
}
