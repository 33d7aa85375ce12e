import { Node } from '../src/node.js';
import { Capture } from '../src/structure.js';
import { Literal, Operator } from '../src/token.js';

export interface SampleTree {
  root: Node;
  a: Literal;
  b: Literal;
  group: Capture;
  open: Operator;
  d: Literal;
  close: Operator;
  c: Literal;
}

/**
 * Tree for `ab(d)c`:
 *   Node
 *     Literal a
 *     Literal b
 *     Capture
 *       Operator (
 *       Literal d
 *       Operator )
 *     Literal c
 */
export function sampleTree(): SampleTree {
  const a = new Literal('a');
  const b = new Literal('b');
  const open = new Operator('(');
  const d = new Literal('d');
  const close = new Operator(')');
  const group = new Capture([open, d, close]);
  const c = new Literal('c');
  const root = new Node([a, b, group, c]);
  return { root, a, b, group, open, d, close, c };
}
