/**
 * Grouping nodes: (?:...) and the capturing (...).
 */

import { registerKind } from './kinds.js';
import { Node } from './node.js';

export class Structure extends Node {}

/** A capture group. Its number is assigned by the lexer's numbering pass. */
export class Capture extends Structure {
  private captureNumber: number | undefined;

  /** Capture number, or undefined before numbering has run. */
  number(): number | undefined {
    return this.captureNumber;
  }

  /**
   * Take the current counter as this group's number; groups nested inside
   * are numbered from the next value.
   * @internal
   */
  recordCaptureNumber(counter: number): number {
    this.captureNumber = counter;
    return super.recordCaptureNumber(counter + 1);
  }
}

registerKind('Rx::Structure', Structure);
registerKind('Rx::Structure::Capture', Capture);
