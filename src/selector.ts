/**
 * Selectors for Node.find() and Node.findFirst().
 *
 * A selector is a kind name ("Token::Literal" or "Rx::Token::Literal"),
 * an element class, or a visitor function. All three resolve to a Visitor
 * returning one of the Visit states.
 */

import { config } from './config.js';
import { Element } from './element.js';
import { type KindClass, lookupKind } from './kinds.js';
import type { Node } from './node.js';

export enum Visit {
  /** Add the candidate to the results. */
  Include = 'include',
  /** Leave it out, but still search inside it. */
  Exclude = 'exclude',
  /** Leave it out and do not search inside it. */
  Prune = 'prune',
}

/** `true` and `false` are shorthand for Include and Exclude. */
export type FindPredicate = (container: Node, candidate: Element) => Visit | boolean;

export type ElementClass<T extends Element = Element> = abstract new (...args: never[]) => T;

export type Selector = string | ElementClass | FindPredicate;

export type Visitor = (container: Node, candidate: Element) => Visit;

/** Prefix a kind name with the namespace unless it already has it. */
export function qualifyKind(name: string): string {
  return name.startsWith(config.namespace) ? name : config.namespace + name;
}

export function isElementClass(value: unknown): value is ElementClass {
  return typeof value === 'function' && (value === Element || value.prototype instanceof Element);
}

/**
 * Read a predicate's return value. Untyped callers may return anything:
 * undefined means Prune, any other value counts by its truthiness.
 */
export function toVisit(value: unknown): Visit {
  switch (value) {
    case Visit.Include:
      return Visit.Include;
    case Visit.Exclude:
      return Visit.Exclude;
    case Visit.Prune:
    case undefined:
      return Visit.Prune;
  }
  return value ? Visit.Include : Visit.Exclude;
}

function instanceVisitor(cls: KindClass): Visitor {
  return (_container, candidate) => (candidate instanceof cls ? Visit.Include : Visit.Exclude);
}

/**
 * Turn a selector into a Visitor. Returns undefined for a value that is
 * none of the selector forms.
 */
export function resolveSelector(selector: Selector): Visitor | undefined {
  if (typeof selector === 'string') {
    const cls = lookupKind(qualifyKind(selector));
    if (!cls) return () => Visit.Exclude;
    return instanceVisitor(cls);
  }
  if (isElementClass(selector)) return instanceVisitor(selector);
  if (typeof selector === 'function') {
    return (container, candidate) => toVisit(selector(container, candidate));
  }
  return undefined;
}
