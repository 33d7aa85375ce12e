/** Base class for errors raised by this package. */
export class RxTreeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RxTreeError';
  }
}

/** A node was handed something that is not an Element. */
export class InvalidElementError extends RxTreeError {
  constructor(public index: number, public value: unknown) {
    super(`Child ${index} is not an element (got ${describe(value)})`);
    this.name = 'InvalidElementError';
  }
}

/** A node was handed an element that already has a parent, or the same element twice. */
export class AttachedElementError extends RxTreeError {
  constructor(public index: number) {
    super(`Child ${index} already belongs to a node`);
    this.name = 'AttachedElementError';
  }
}

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'object') return value.constructor?.name ?? 'object';
  return typeof value;
}
