import { ConsumedBoxError } from '../errors/errors.js';

/**
 * Exclusive-ownership container.
 *
 * Handing a Box to `internBox()` moves its value into the interner; the box is
 * empty afterwards and cannot be read or consumed again.
 *
 * @example
 * ```typescript
 * const box = Box.of(new Point(1, 2));
 * const ref = interner.internBox(box);
 * box.consumed; // true
 * ```
 */
export class Box<T> {
  static of<T>(value: T): Box<T> {
    return new Box(value);
  }

  private content: { value: T } | undefined;

  constructor(value: T) {
    this.content = { value };
  }

  get consumed(): boolean {
    return this.content === undefined;
  }

  /**
   * Read the boxed value without taking it.
   *
   * @throws {ConsumedBoxError} if the value was already taken
   */
  peek(): T {
    if (!this.content) throw new ConsumedBoxError();
    return this.content.value;
  }

  /**
   * Move the value out, leaving the box empty.
   *
   * @throws {ConsumedBoxError} if the value was already taken
   */
  take(): T {
    if (!this.content) throw new ConsumedBoxError();
    const { value } = this.content;
    this.content = undefined;
    return value;
  }
}
