import { hashString } from '../src/core/hash.js';
import type { Cloneable, Hashable } from '../src/types/types.js';

/** Value type with its own hash, equality and duplication. */
export class Point implements Hashable, Cloneable<Point> {
  constructor(
    readonly x: number,
    readonly y: number
  ) {}

  hashCode(): number {
    return Math.imul(this.x, 31) + this.y;
  }

  equals(other: unknown): boolean {
    return other instanceof Point && other.x === this.x && other.y === this.y;
  }

  clone(): Point {
    return new Point(this.x, this.y);
  }
}

/** Hashable value that records how often it was disposed. */
export class Resource implements Hashable {
  disposed = 0;

  constructor(readonly id: string) {}

  hashCode(): number {
    return hashString(this.id);
  }

  equals(other: unknown): boolean {
    return other instanceof Resource && other.id === this.id;
  }

  dispose(): void {
    this.disposed++;
  }
}
