/**
 * Node — an element that owns an ordered list of child elements.
 *
 * Child order is document order. A node is built once from its children
 * and never changes shape afterwards; the lexer's finalize and capture
 * numbering passes only touch state inside the children.
 */

import { Element, type NavStep, isElement } from './element.js';
import { AttachedElementError, InvalidElementError } from './errors.js';
import { registerKind } from './kinds.js';
import { createServiceLogger } from './logger.js';
import { type ElementClass, type FindPredicate, type Selector, type Visitor, Visit, resolveSelector } from './selector.js';
import type { Token } from './token.js';
import { type HostVersion, MINIMUM_HOST_VERSION, earlierRemoval, laterVersion } from './version.js';

const log = createServiceLogger('node');

export class Node extends Element {
  private readonly kids: readonly Element[];

  /**
   * Throws InvalidElementError if a child is not an Element, and
   * AttachedElementError if it already belongs to a node or is listed twice.
   */
  constructor(children: readonly Element[] = []) {
    super();
    children.forEach((child, index) => {
      if (!isElement(child)) throw new InvalidElementError(index, child);
      if (child.parent() !== null || children.indexOf(child) !== index) {
        throw new AttachedElementError(index);
      }
    });
    this.kids = [...children];
    for (const child of this.kids) child.attachTo(this);
  }

  /**
   * Build a node of the calling class, or return undefined if any item is
   * not an Element, already has a parent, or appears twice. No partial
   * node is created.
   */
  static create<T extends Node>(
    this: new (children: readonly Element[]) => T,
    children: readonly unknown[],
  ): T | undefined {
    const elems: Element[] = [];
    for (const child of children) {
      if (!isElement(child) || child.parent() !== null || elems.includes(child)) return undefined;
      elems.push(child);
    }
    return new this(elems);
  }

  // --- Structure ---

  /** Child at raw position `index`; negative counts from the end. */
  child(index = 0): Element | null {
    return this.kids[index < 0 ? this.kids.length + index : index] ?? null;
  }

  children(): readonly Element[] {
    return this.kids;
  }

  childCount(): number {
    return this.kids.length;
  }

  elements(): readonly Element[] {
    return this.kids;
  }

  firstElement(): Element | null {
    return this.kids[0] ?? null;
  }

  lastElement(): Element | null {
    return this.kids[this.kids.length - 1] ?? null;
  }

  /** True if `candidate` is a strict descendant of this node. */
  contains(candidate: unknown): boolean {
    if (!isElement(candidate)) return false;
    for (let p = candidate.parent(); p; p = p.parent()) {
      if (p === this) return true;
    }
    return false;
  }

  content(): string {
    return this.elements().map(e => e.content()).join('');
  }

  tokens(): Token[] {
    return this.elements().flatMap(e => e.tokens());
  }

  // --- Significant children ---

  /**
   * The `index`th significant child. schild(0) is the first, schild(-1)
   * the last. Returns null past either end.
   */
  schild(index = 0): Element | null {
    const kids = this.kids;
    let n = index;
    if (n >= 0) {
      for (const kid of kids) {
        if (!kid.significant()) continue;
        if (n-- === 0) return kid;
      }
    } else {
      for (let loc = kids.length - 1; loc >= 0; loc--) {
        const kid = kids[loc];
        if (!kid.significant()) continue;
        if (n++ === -1) return kid;
      }
    }
    return null;
  }

  schildren(): Element[] {
    return this.kids.filter(kid => kid.significant());
  }

  schildCount(): number {
    let count = 0;
    for (const kid of this.kids) {
      if (kid.significant()) count++;
    }
    return count;
  }

  // --- Search ---

  /**
   * Every element below this node accepted by `selector`, in document
   * order. An empty array means nothing matched; undefined means the
   * selector was unusable or the visitor threw while looking at one of
   * this node's own elements. A throw further down only drops that
   * subtree's results.
   */
  find(selector: FindPredicate): Element[] | undefined;
  find<T extends Element>(selector: ElementClass<T>): T[] | undefined;
  find(selector: Selector): Element[] | undefined;
  find(selector: Selector): Element[] | undefined {
    const visit = resolveSelector(selector);
    if (!visit) {
      log.debug('unusable selector', { selector: typeof selector });
      return undefined;
    }
    const found: Element[] = [];
    for (const elem of this.elements()) {
      const result = this.visitSafely(visit, elem);
      if (result === undefined) return undefined;
      if (result === Visit.Include) found.push(elem);
      if (!(elem instanceof Node) || result === Visit.Prune) continue;
      const nested = elem.find(visit);
      if (nested) found.push(...nested);
    }
    return found;
  }

  /**
   * First element below this node accepted by `selector`, in pre-order.
   * null when nothing matches; undefined when the selector is unusable
   * or the visitor threw anywhere in the search.
   */
  findFirst(selector: FindPredicate): Element | null | undefined;
  findFirst<T extends Element>(selector: ElementClass<T>): T | null | undefined;
  findFirst(selector: Selector): Element | null | undefined;
  findFirst(selector: Selector): Element | null | undefined {
    const visit = resolveSelector(selector);
    if (!visit) {
      log.debug('unusable selector', { selector: typeof selector });
      return undefined;
    }
    for (const elem of this.elements()) {
      const result = this.visitSafely(visit, elem);
      if (result === undefined) return undefined;
      if (result === Visit.Include) return elem;
      if (!(elem instanceof Node) || result === Visit.Prune) continue;
      const nested = elem.findFirst(visit);
      if (nested !== null) return nested;
    }
    return null;
  }

  private visitSafely(visit: Visitor, elem: Element): Visit | undefined {
    try {
      return visit(this, elem);
    } catch (error) {
      log.debug('find visitor threw', {
        container: this.kind(),
        candidate: elem.kind(),
        error: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }
  }

  // --- Host versions ---

  /** Newest versionIntroduced() of the elements, never below the minimum. */
  versionIntroduced(): HostVersion {
    let v = MINIMUM_HOST_VERSION;
    for (const elem of this.elements()) {
      v = laterVersion(v, elem.versionIntroduced());
    }
    return v;
  }

  /** Oldest versionRemoved() defined by any element. */
  versionRemoved(): HostVersion | undefined {
    let v: HostVersion | undefined;
    for (const elem of this.elements()) {
      v = earlierRemoval(v, elem.versionRemoved());
    }
    return v;
  }

  // --- Lexer hooks ---

  /** @internal */
  finalize(): number {
    let failures = 0;
    for (const elem of this.elements()) {
      failures += elem.finalize();
    }
    return failures;
  }

  /** @internal */
  recordCaptureNumber(counter: number): number {
    let n = counter;
    for (const kid of this.kids) {
      n = kid.recordCaptureNumber(n);
    }
    return n;
  }

  // --- Navigation ---

  /** How to reach `child` from this node, if it is a direct child. */
  navStep(child: Element): NavStep | undefined {
    if (child.parent() !== this) return undefined;
    const index = this.kids.indexOf(child);
    if (index < 0) return undefined;
    return { accessor: 'child', index };
  }

  /** Follow steps produced by Element.nav(). null if a step leads nowhere. */
  navigate(steps: readonly NavStep[]): Element | null {
    let e: Element | null = this;
    for (const step of steps) {
      if (!(e instanceof Node)) return null;
      e = e.child(step.index);
    }
    return e;
  }
}

registerKind('Rx::Node', Node);
