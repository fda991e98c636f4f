import type {
  CollisionCause,
  Direction,
  Position,
  SnakeBody,
  StepOutcome,
  WorldSnapshot,
} from '@snake-agent/shared';
import {
  DIRECTION_VECTORS,
  ConfigError,
  EpisodeEndedError,
  GridSizeSchema,
  InvalidActionError,
  PositionSchema,
  isDirection,
  parseConfig,
} from '@snake-agent/shared';
import { isOnGrid } from './helpers/isUnsafe.js';
import { createRng, type RandomSource } from './helpers/random.js';

/**
 * GridWorld 생성 옵션
 *
 * `random`이 있으면 `seed`보다 우선합니다. 둘 다 없으면 시드 0을 사용합니다.
 * `snake`/`direction`/`food`는 테스트나 재현용 초기 상태 지정에 사용합니다.
 */
export interface GridWorldOptions {
  readonly size: number;
  readonly seed?: number;
  readonly random?: RandomSource;
  readonly snake?: SnakeBody;
  readonly direction?: Direction;
  /** 지정하지 않으면 난수로 배치, null이면 먹이 없음 */
  readonly food?: Position | null;
}

/** 마지막 충돌 정보 */
export interface CollisionInfo {
  readonly cause: Exclude<CollisionCause, 'boxed-in'>;
  /** 충돌한 머리 위치 (보드 밖일 수 있음) */
  readonly head: Position;
}

const samePosition = (a: Position, b: Position): boolean => a.x === b.x && a.y === b.y;

/**
 * 스네이크 그리드 환경
 *
 * 그리드 크기, 몸통(머리 → 꼬리), 현재 방향, 먹이 위치를 소유하며
 * `step`으로만 상태가 바뀝니다. 먹이 재배치를 제외하면 결정적이며,
 * 재배치는 주입된 난수 소스만 사용합니다.
 *
 * @example
 * ```typescript
 * const world = new GridWorld({ size: 10, seed: 42 });
 * const outcome = world.step('up'); // 'continue' | 'ate' | 'collided'
 * ```
 */
export class GridWorld {
  readonly size: number;
  private readonly random: RandomSource;
  private readonly initialSnake: SnakeBody;
  private readonly initialDirection: Direction;
  private readonly initialFood: Position | null | undefined;

  private snake: Position[] = [];
  private direction: Direction = 'up';
  private food: Position | null = null;
  private score = 0;
  private done = false;
  private collision: CollisionInfo | null = null;

  constructor(options: GridWorldOptions) {
    this.size = parseConfig(GridSizeSchema, options.size);
    this.random = options.random ?? createRng(options.seed ?? 0);

    const snake = options.snake ?? GridWorld.defaultSnake(this.size);
    this.validateSnake(snake);
    this.initialSnake = snake.map((segment) => ({ x: segment.x, y: segment.y }));

    const direction = options.direction ?? 'up';
    if (!isDirection(direction)) throw new InvalidActionError(direction);
    this.initialDirection = direction;

    if (options.food !== undefined && options.food !== null) {
      this.validateFood(options.food, snake);
    }
    this.initialFood = options.food;

    this.reset();
  }

  /**
   * 기본 시작 배치: 중앙 머리 + 바로 아래 꼬리, 위쪽 진행
   * 1x1 그리드는 머리 한 칸만 놓습니다.
   */
  static defaultSnake(size: number): Position[] {
    if (size < 2) return [{ x: 0, y: 0 }];
    const x = Math.floor(size / 2);
    const y = Math.min(Math.floor(size / 2), size - 2);
    return [
      { x, y },
      { x, y: y + 1 },
    ];
  }

  /**
   * 초기 상태로 되돌리기
   * 먹이를 지정하지 않았다면 같은 난수 소스에서 새로 배치합니다.
   */
  reset(): WorldSnapshot {
    this.snake = this.initialSnake.map((segment) => ({ x: segment.x, y: segment.y }));
    this.direction = this.initialDirection;
    this.food = this.initialFood === undefined ? this.placeFood() : this.initialFood;
    this.score = 0;
    this.done = false;
    this.collision = null;
    return this.snapshot();
  }

  /**
   * 한 틱 진행
   *
   * 새 머리 = 머리 + 방향 벡터. 보드 밖이거나 이번 틱 이후 남는 몸통과
   * 겹치면 'collided'를 반환하고 몸통/먹이/점수는 그대로 둔 채 종료합니다.
   * 먹이를 먹으면 꼬리를 유지하고(성장) 먹이를 빈 칸으로 옮깁니다.
   *
   * @param direction 이동 방향
   * @returns 틱 결과
   * @throws InvalidActionError 행동 공간 밖의 방향
   * @throws EpisodeEndedError 이미 종료된 에피소드
   */
  step(direction: Direction): StepOutcome {
    if (!isDirection(direction)) throw new InvalidActionError(direction);
    if (this.done) throw new EpisodeEndedError();

    const head = this.head();
    const vec = DIRECTION_VECTORS[direction];
    const newHead: Position = { x: head.x + vec.x, y: head.y + vec.y };

    if (!isOnGrid(newHead, this.size)) {
      return this.collide('wall', newHead);
    }

    const eating = this.food !== null && samePosition(newHead, this.food);
    // 먹지 않는 틱에는 꼬리가 비워지므로 꼬리를 제외하고 검사
    const remaining = eating ? this.snake : this.snake.slice(0, -1);
    if (remaining.some((segment) => samePosition(segment, newHead))) {
      return this.collide('self', newHead);
    }

    this.direction = direction;
    this.snake.unshift(newHead);

    if (eating) {
      this.score += 1;
      this.food = this.placeFood();
      return 'ate';
    }

    this.snake.pop();
    return 'continue';
  }

  /** 머리 위치 */
  head(): Position {
    const head = this.snake[0];
    if (head === undefined) throw new ConfigError(['snake: 몸통이 비어 있습니다']);
    return head;
  }

  /** 몸통 (머리 → 꼬리, 읽기 전용 복사본) */
  body(): SnakeBody {
    return this.snake.map((segment) => ({ x: segment.x, y: segment.y }));
  }

  /** 현재 진행 방향 */
  currentDirection(): Direction {
    return this.direction;
  }

  /** 먹이 위치 (보드가 가득 차면 null) */
  foodPosition(): Position | null {
    return this.food;
  }

  /** 먹은 먹이 수 */
  currentScore(): number {
    return this.score;
  }

  /** 충돌로 종료되었는지 */
  isDone(): boolean {
    return this.done;
  }

  /** 스네이크가 보드를 가득 채웠는지 */
  isFilled(): boolean {
    return this.snake.length >= this.size * this.size;
  }

  /** 마지막 충돌 정보 (충돌 전에는 null) */
  lastCollision(): CollisionInfo | null {
    return this.collision;
  }

  /** 현재 상태 스냅샷 */
  snapshot(): WorldSnapshot {
    return {
      size: this.size,
      snake: this.body(),
      direction: this.direction,
      food: this.food === null ? null : { x: this.food.x, y: this.food.y },
      score: this.score,
      done: this.done,
    };
  }

  private collide(cause: CollisionInfo['cause'], head: Position): StepOutcome {
    this.done = true;
    this.collision = { cause, head };
    return 'collided';
  }

  /**
   * 빈 칸 중 하나를 균등하게 선택 (행 우선 순서 목록에서 ⌊random·n⌋번째)
   * 빈 칸이 없으면 null
   */
  private placeFood(): Position | null {
    const occupied = new Set(this.snake.map((segment) => segment.y * this.size + segment.x));
    const free: Position[] = [];
    for (let y = 0; y < this.size; y++) {
      for (let x = 0; x < this.size; x++) {
        if (!occupied.has(y * this.size + x)) free.push({ x, y });
      }
    }
    if (free.length === 0) return null;

    const index = Math.min(free.length - 1, Math.floor(this.random() * free.length));
    return free[index] ?? null;
  }

  private validateSnake(snake: SnakeBody): void {
    const issues: string[] = [];
    if (snake.length === 0) issues.push('snake: 최소 한 칸이 필요합니다');

    const seen = new Set<number>();
    snake.forEach((segment, index) => {
      if (!PositionSchema.safeParse(segment).success || !isOnGrid(segment, this.size)) {
        issues.push(`snake.${String(index)}: 보드 밖 좌표입니다`);
        return;
      }
      const key = segment.y * this.size + segment.x;
      if (seen.has(key)) issues.push(`snake.${String(index)}: 중복 좌표입니다`);
      seen.add(key);
    });

    if (issues.length > 0) throw new ConfigError(issues);
  }

  private validateFood(food: Position, snake: SnakeBody): void {
    if (!PositionSchema.safeParse(food).success || !isOnGrid(food, this.size)) {
      throw new ConfigError(['food: 보드 밖 좌표입니다']);
    }
    if (snake.some((segment) => samePosition(segment, food))) {
      throw new ConfigError(['food: 몸통 위에 놓일 수 없습니다']);
    }
  }
}
