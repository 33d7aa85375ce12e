/**
 * rxtree — container nodes for regular-expression syntax trees.
 *
 * Public API surface.
 */

// --- Configuration and logging ---
export { config, type RxTreeConfig, type LogLevel } from './config.js';
export { logger, createServiceLogger } from './logger.js';
export { RxTreeError, InvalidElementError, AttachedElementError } from './errors.js';

// --- Host versions ---
export {
  type HostVersion, MINIMUM_HOST_VERSION,
  laterVersion, earlierRemoval, formatHostVersion,
} from './version.js';

// --- Elements ---
export { Element, type NavStep, isElement } from './element.js';
export { Node } from './node.js';
export {
  Token, type TokenOptions,
  Literal, Operator, Whitespace, Comment, Unknown,
} from './token.js';
export { Structure, Capture } from './structure.js';

// --- Search ---
export {
  Visit, type FindPredicate, type ElementClass, type Selector, type Visitor,
  qualifyKind, isElementClass, toVisit, resolveSelector,
} from './selector.js';
export { registerKind, lookupKind, kindOf, type KindClass } from './kinds.js';
