import type { Board, Direction, Position } from '@snake-agent/shared';
import { CELL, DIRECTIONS, DIRECTION_VECTORS } from '@snake-agent/shared';
import { manhattan } from './manhattan.js';

/** A* 노드 */
interface AStarNode {
  readonly pos: Position;
  readonly g: number; // 시작점부터의 실제 비용
  readonly f: number; // g + 휴리스틱
  readonly dir: Direction | null; // 부모에서 이 노드로 온 방향
  readonly parent: AStarNode | null;
}

/**
 * 우선순위 큐 (최소 힙) - f 값이 작은 노드가 우선
 * f가 같으면 먼저 들어온 노드가 우선합니다 (결정적 경로).
 */
class MinHeap {
  private heap: { node: AStarNode; order: number }[] = [];
  private counter = 0;

  push(node: AStarNode): void {
    this.heap.push({ node, order: this.counter++ });
    this.bubbleUp(this.heap.length - 1);
  }

  pop(): AStarNode | undefined {
    const top = this.heap[0];
    const last = this.heap.pop();
    if (top === undefined || last === undefined) return undefined;
    if (this.heap.length > 0) {
      this.heap[0] = last;
      this.bubbleDown(0);
    }
    return top.node;
  }

  isEmpty(): boolean {
    return this.heap.length === 0;
  }

  private less(a: number, b: number): boolean {
    const left = this.heap[a];
    const right = this.heap[b];
    if (left === undefined || right === undefined) return false;
    if (left.node.f !== right.node.f) return left.node.f < right.node.f;
    return left.order < right.order;
  }

  private swap(a: number, b: number): void {
    const left = this.heap[a];
    const right = this.heap[b];
    if (left === undefined || right === undefined) return;
    this.heap[a] = right;
    this.heap[b] = left;
  }

  private bubbleUp(index: number): void {
    while (index > 0) {
      const parentIndex = Math.floor((index - 1) / 2);
      if (!this.less(index, parentIndex)) break;
      this.swap(index, parentIndex);
      index = parentIndex;
    }
  }

  private bubbleDown(index: number): void {
    const length = this.heap.length;
    while (index < length) {
      const leftChild = 2 * index + 1;
      const rightChild = 2 * index + 2;
      let smallest = index;
      if (leftChild < length && this.less(leftChild, smallest)) smallest = leftChild;
      if (rightChild < length && this.less(rightChild, smallest)) smallest = rightChild;
      if (smallest === index) break;
      this.swap(index, smallest);
      index = smallest;
    }
  }
}

/**
 * A* 경로 탐색 알고리즘
 *
 * 보드 인코딩 위에서 시작점에서 목표점까지의 최단 경로를 찾습니다.
 * 스네이크 칸은 벽으로 취급하되, 목표 칸(예: 꼬리)은 통과 가능합니다.
 * 맨해튼 휴리스틱을 사용합니다.
 *
 * @param from 시작 위치
 * @param to 목표 위치
 * @param board 보드 인코딩
 * @returns 이동 방향 배열 (최단 경로). 경로가 없거나 같은 위치면 빈 배열.
 */
export function pathfind(from: Position, to: Position, board: Board): Direction[] {
  if (from.x === to.x && from.y === to.y) return [];

  const width = board.length;
  const posKey = (pos: Position): number => pos.y * width + pos.x;

  const isBlocked = (pos: Position): boolean => {
    const cell = board[pos.y]?.[pos.x];
    if (cell === undefined) return true;
    if (pos.x === to.x && pos.y === to.y) return false;
    return cell === CELL.SNAKE;
  };

  if (isBlocked(to)) return [];

  const openSet = new MinHeap();
  const closedSet = new Set<number>();
  const gScores = new Map<number, number>();

  openSet.push({ pos: from, g: 0, f: manhattan(from, to), dir: null, parent: null });
  gScores.set(posKey(from), 0);

  while (!openSet.isEmpty()) {
    const current = openSet.pop();
    if (current === undefined) break;

    // 목표 도달
    if (current.pos.x === to.x && current.pos.y === to.y) {
      return reconstructPath(current);
    }

    const currentKey = posKey(current.pos);
    if (closedSet.has(currentKey)) continue;
    closedSet.add(currentKey);

    for (const dir of DIRECTIONS) {
      const vec = DIRECTION_VECTORS[dir];
      const pos: Position = { x: current.pos.x + vec.x, y: current.pos.y + vec.y };
      if (isBlocked(pos)) continue;

      const key = posKey(pos);
      if (closedSet.has(key)) continue;

      // 이동 비용은 1 (균일 그리드)
      const g = current.g + 1;
      const existingG = gScores.get(key);
      if (existingG === undefined || g < existingG) {
        gScores.set(key, g);
        openSet.push({ pos, g, f: g + manhattan(pos, to), dir, parent: current });
      }
    }
  }

  return [];
}

/**
 * 부모 노드를 역추적하여 방향 배열 생성
 */
function reconstructPath(goalNode: AStarNode): Direction[] {
  const path: Direction[] = [];
  let current: AStarNode | null = goalNode;

  while (current !== null && current.dir !== null) {
    path.unshift(current.dir);
    current = current.parent;
  }

  return path;
}
