const IS_PROD = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

const join = (lines: string[]): string => lines.join('\n');
const format = (prod: string, devLines: string[]): string => (IS_PROD ? prod : join(devLines));

const describeValue = (value: unknown): string => {
  if (typeof value === 'function') return `function ${value.name || '(anonymous)'}`;
  if (Array.isArray(value)) return `array of length ${value.length}`;
  if (value !== null && typeof value === 'object') {
    // Object.create(null) has no constructor
    const ctorName: string | undefined = value.constructor?.name;
    return ctorName && ctorName !== 'Object' ? `instance of ${ctorName}` : 'object';
  }
  return typeof value;
};

/**
 * A Ref was used after its holder released it.
 */
export class ReleasedRefError extends Error {
  constructor(public operation: string) {
    const dev = [
      'Released ref',
      '',
      `Cannot ${operation} a ref that has already been released.`,
      '',
      'Each Ref object stands for one strong reference and may be released once.',
      '',
      'To fix this:',
      `  1. Call clone() before release() if the value is still needed`,
      `  2. Keep a single owner responsible for calling release()`,
    ];
    super(format(`Cannot ${operation} a released ref.`, dev));
    this.name = 'ReleasedRefError';
  }
}

/**
 * The default equivalence has no hash/equality for the given value.
 */
export class UnhashableValueError extends Error {
  public readonly kind: string;

  constructor(public value: unknown) {
    const kind = describeValue(value);
    const dev = [
      'Unhashable value',
      '',
      `The default equivalence cannot intern a value of kind '${kind}'.`,
      'Primitives and objects implementing hashCode()/equals() are supported.',
      '',
      'To fix this:',
      `  1. Implement the Hashable interface (hashCode() and equals(other)) on the value`,
      `  2. Or pass an 'equivalence' in the interner config`,
    ];
    super(format(`Cannot intern unhashable value (${kind}).`, dev));
    this.name = 'UnhashableValueError';
    this.kind = kind;
  }
}

/**
 * The default duplication has no way to copy the given value.
 */
export class UncloneableValueError extends Error {
  public readonly kind: string;

  constructor(public value: unknown) {
    const kind = describeValue(value);
    const dev = [
      'Uncloneable value',
      '',
      `internCloned() cannot duplicate a value of kind '${kind}'.`,
      'Primitives, arrays and objects implementing clone() are supported.',
      '',
      'To fix this:',
      `  1. Implement the Cloneable interface (clone()) on the value`,
      `  2. Or pass a 'clone' hook in the interner config`,
    ];
    super(format(`Cannot clone value (${kind}); pass a 'clone' hook.`, dev));
    this.name = 'UncloneableValueError';
    this.kind = kind;
  }
}

export class ConsumedBoxError extends Error {
  constructor() {
    const dev = [
      'Consumed box',
      '',
      'This Box has already handed its value over and is now empty.',
      'A Box transfers exclusive ownership exactly once.',
    ];
    super(format('Box has already been consumed.', dev));
    this.name = 'ConsumedBoxError';
  }
}

export class InternerDisposedError extends Error {
  constructor(public internerName: string) {
    const dev = [
      'Interner disposed',
      '',
      `Interner '${internerName}' has been disposed. Do not intern or look up values after dispose().`,
      '',
      'Refs handed out before disposal remain valid.',
    ];
    super(format(`Interner '${internerName}' has been disposed.`, dev));
    this.name = 'InternerDisposedError';
  }
}

export class InvalidRangeError extends Error {
  constructor(
    public start: number,
    public end: number,
    public length: number
  ) {
    const dev = [
      'Invalid range',
      '',
      `Range [${start}, ${end}) does not fit a view of length ${length}.`,
      `Expected integers with 0 <= start <= end <= ${length}.`,
    ];
    super(format(`Invalid range [${start}, ${end}) for length ${length}.`, dev));
    this.name = 'InvalidRangeError';
  }
}

/**
 * One or more finalizers threw while the interner released its refs
 * (compact, clear or dispose). Every ref is still released.
 */
export class AggregateDisposalError extends Error {
  constructor(public errors: Error[]) {
    const errorList = errors.map((e, i) => `  ${i + 1}. ${e.message}`).join('\n');
    const dev = [
      'Multiple disposal errors occurred',
      '',
      `${errors.length} error(s) occurred while releasing interned values:`,
      errorList,
      '',
      'Check the `errors` property for detailed information about each failure.',
    ];

    super(format(`${errors.length} disposal error(s) occurred.`, dev));
    this.name = 'AggregateDisposalError';
  }
}
