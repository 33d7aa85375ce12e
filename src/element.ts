/**
 * Element — anything that can sit in a regexp syntax tree.
 *
 * Leaf tokens and container nodes both derive from this class. The parent
 * link is a plain back-reference set by the owning Node; the owner holds
 * the only forward reference.
 */

import { registerKind, kindOf } from './kinds.js';
import { type HostVersion, MINIMUM_HOST_VERSION } from './version.js';
import type { Node } from './node.js';
import type { Token } from './token.js';

/** One step of a path from a node to one of its children. */
export interface NavStep {
  accessor: 'child';
  index: number;
}

export abstract class Element {
  private parentNode: Node | null = null;

  /** Source text this element covers. */
  abstract content(): string;

  /** Leaf tokens under this element, in document order. */
  abstract tokens(): Token[];

  parent(): Node | null {
    return this.parentNode;
  }

  /**
   * Record the owning node. Called by Node's constructor only.
   * @internal
   */
  attachTo(parent: Node): void {
    this.parentNode = parent;
  }

  /** False for layout such as whitespace and comments. */
  significant(): boolean {
    return true;
  }

  /** Earliest host version under which this element is valid. */
  versionIntroduced(): HostVersion {
    return MINIMUM_HOST_VERSION;
  }

  /** Host version where this element stops being valid, if any. */
  versionRemoved(): HostVersion | undefined {
    return undefined;
  }

  /** Whether a host at version `v` accepts this element. */
  acceptsHostVersion(v: HostVersion): boolean {
    if (v < this.versionIntroduced()) return false;
    const removed = this.versionRemoved();
    return removed === undefined || v < removed;
  }

  /** Child elements. Leaves have none. */
  elements(): readonly Element[] {
    return [];
  }

  /** Registered kind name, e.g. "Rx::Token::Literal". */
  kind(): string {
    return kindOf(this.constructor) ?? this.constructor.name;
  }

  // --- Lexer hooks ---

  /**
   * Run once the whole tree exists. Returns the number of parse failures
   * found at or below this element.
   * @internal
   */
  finalize(): number {
    return 0;
  }

  /**
   * Thread the capture counter through this element and return the value
   * the next element should see.
   * @internal
   */
  recordCaptureNumber(counter: number): number {
    return counter;
  }

  // --- Navigation ---

  /** Root of the tree this element belongs to. */
  top(): Element {
    let e: Element = this;
    for (let p = e.parent(); p; p = e.parent()) e = p;
    return e;
  }

  nextSibling(): Element | null {
    return this.sibling(1, false);
  }

  previousSibling(): Element | null {
    return this.sibling(-1, false);
  }

  /** Nearest following sibling that is significant. */
  snextSibling(): Element | null {
    return this.sibling(1, true);
  }

  /** Nearest preceding sibling that is significant. */
  spreviousSibling(): Element | null {
    return this.sibling(-1, true);
  }

  private sibling(step: 1 | -1, significantOnly: boolean): Element | null {
    const kids = this.parentNode?.children();
    if (!kids) return null;
    for (let i = kids.indexOf(this) + step; i >= 0 && i < kids.length; i += step) {
      if (!significantOnly || kids[i].significant()) return kids[i];
    }
    return null;
  }

  /** True if this is `elem` or one of its ancestors. */
  ancestorOf(elem: Element): boolean {
    for (let e: Element | null = elem; e; e = e.parent()) {
      if (e === this) return true;
    }
    return false;
  }

  /** True if `node` is this element or one of its ancestors. */
  descendantOf(node: Element): boolean {
    return node.ancestorOf(this);
  }

  /**
   * Steps that lead from top() down to this element, so the same
   * position can be found again with Node.navigate().
   */
  nav(): NavStep[] {
    const steps: NavStep[] = [];
    let e: Element = this;
    for (let p = e.parent(); p; p = e.parent()) {
      const step = p.navStep(e);
      if (!step) break;
      steps.unshift(step);
      e = p;
    }
    return steps;
  }
}

/** Runtime check of the Element contract. */
export function isElement(value: unknown): value is Element {
  return value instanceof Element;
}

registerKind('Rx::Element', Element);
