/**
 * Search tree node and frontier for uniform-cost search
 */

import type { Move } from '../domain/types.js';

export interface SearchNode {
  key: string;               // canonical state key
  parent: SearchNode | null;
  move: Move | null;         // move that produced this node from its parent
  depth: number;
  cost: number;              // g(n) - cost from start
}

/**
 * Create a search node
 */
export function createSearchNode(
  key: string,
  parent: SearchNode | null,
  move: Move | null,
  cost: number
): SearchNode {
  return {
    key,
    parent,
    move,
    depth: parent ? parent.depth + 1 : 0,
    cost,
  };
}

/**
 * Extract the moves from root to this node
 */
export function extractMovePath(node: SearchNode): Move[] {
  const moves: Move[] = [];
  let current: SearchNode | null = node;

  while (current !== null) {
    if (current.move !== null) {
      moves.push(current.move);
    }
    current = current.parent;
  }

  return moves.reverse();
}

/**
 * Frontier order: cheapest first, ties broken by canonical key
 */
export function compareSearchNodes(a: SearchNode, b: SearchNode): number {
  if (a.cost !== b.cost) return a.cost - b.cost;
  if (a.key < b.key) return -1;
  if (a.key > b.key) return 1;
  return 0;
}

/**
 * Binary min-heap ordered by a comparator
 */
export class PriorityQueue<T> {
  private items: T[] = [];

  constructor(private readonly compare: (a: T, b: T) => number) {}

  push(item: T): void {
    this.items.push(item);
    this.bubbleUp(this.items.length - 1);
  }

  pop(): T | undefined {
    if (this.items.length === 0) return undefined;

    const result = this.items[0];
    const last = this.items.pop();

    if (this.items.length > 0 && last !== undefined) {
      this.items[0] = last;
      this.bubbleDown(0);
    }

    return result;
  }

  peek(): T | undefined {
    return this.items[0];
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  size(): number {
    return this.items.length;
  }

  private bubbleUp(index: number): void {
    while (index > 0) {
      const parentIndex = Math.floor((index - 1) / 2);
      if (this.compare(this.items[parentIndex], this.items[index]) <= 0) {
        break;
      }
      [this.items[parentIndex], this.items[index]] = [this.items[index], this.items[parentIndex]];
      index = parentIndex;
    }
  }

  private bubbleDown(index: number): void {
    while (true) {
      const leftChild = 2 * index + 1;
      const rightChild = 2 * index + 2;
      let smallest = index;

      if (leftChild < this.items.length &&
          this.compare(this.items[leftChild], this.items[smallest]) < 0) {
        smallest = leftChild;
      }

      if (rightChild < this.items.length &&
          this.compare(this.items[rightChild], this.items[smallest]) < 0) {
        smallest = rightChild;
      }

      if (smallest === index) break;

      [this.items[smallest], this.items[index]] = [this.items[index], this.items[smallest]];
      index = smallest;
    }
  }
}
