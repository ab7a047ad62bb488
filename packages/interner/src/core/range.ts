import { InvalidRangeError } from '../errors/errors.js';

/**
 * Validate a half-open range `[start, end)` over a view of `length` items.
 */
export function assertRange(start: number, end: number, length: number): void {
  if (
    !Number.isInteger(start) ||
    !Number.isInteger(end) ||
    start < 0 ||
    start > end ||
    end > length
  ) {
    throw new InvalidRangeError(start, end, length);
  }
}
