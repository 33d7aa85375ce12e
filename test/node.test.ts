import { describe, it, expect } from 'vitest';
import { Node } from '../src/node.js';
import { Capture, Structure } from '../src/structure.js';
import { Comment, Literal, Whitespace } from '../src/token.js';
import { type Element } from '../src/element.js';
import { AttachedElementError, InvalidElementError } from '../src/errors.js';
import { sampleTree } from './fixtures.js';

describe('Node construction', () => {
  it('sets parent back-references on every child', () => {
    const { root, a, b, group, c, d } = sampleTree();
    expect(a.parent()).toBe(root);
    expect(b.parent()).toBe(root);
    expect(group.parent()).toBe(root);
    expect(c.parent()).toBe(root);
    expect(d.parent()).toBe(group);
    expect(root.parent()).toBeNull();
  });

  it('keeps children in the order given', () => {
    const { root, a, b, group, c } = sampleTree();
    expect(root.children()).toEqual([a, b, group, c]);
    expect(root.elements()).toEqual([a, b, group, c]);
  });

  it('create() builds an instance of the calling class', () => {
    const x = new Literal('x');
    const cap = Capture.create([x]);
    expect(cap).toBeInstanceOf(Capture);
    expect(cap?.child(0)).toBe(x);
    expect(x.parent()).toBe(cap);
  });

  it('create() refuses a non-element and leaves the others untouched', () => {
    const x = new Literal('x');
    expect(Node.create([x, 'y'])).toBeUndefined();
    expect(Structure.create([{ content: () => 'z' }])).toBeUndefined();
    expect(x.parent()).toBeNull();
  });

  it('the constructor throws InvalidElementError with the bad index', () => {
    const bogus: unknown = 'y';
    const build = () => new Node([new Literal('x'), bogus as Element]);
    expect(build).toThrow(InvalidElementError);
    expect(build).toThrow('Child 1 is not an element (got string)');
  });

  it('refuses an element that already belongs to another node', () => {
    const x = new Literal('x');
    const first = new Node([x]);
    expect(() => new Node([x])).toThrow(AttachedElementError);
    expect(() => new Node([x])).toThrow('Child 0 already belongs to a node');
    expect(Node.create([x])).toBeUndefined();
    expect(x.parent()).toBe(first);
    expect(first.contains(x)).toBe(true);
  });

  it('refuses the same element listed twice', () => {
    const x = new Literal('x');
    expect(() => new Node([x, x])).toThrow('Child 1 already belongs to a node');
    expect(Node.create([x, x])).toBeUndefined();
    expect(x.parent()).toBeNull();
  });

  it('negative child indices count from the end', () => {
    const { root, b } = sampleTree();
    expect(root.child(-3)).toBe(b);
    expect(root.child(-4)).toBe(root.child(0));
  });

  it('an empty node has no children', () => {
    const empty = new Node();
    expect(empty.children()).toEqual([]);
    expect(empty.childCount()).toBe(0);
    expect(empty.content()).toBe('');
  });
});

describe('Node navigation', () => {
  it('child() indexes by raw position, defaulting to 0', () => {
    const { root, a, group, c } = sampleTree();
    expect(root.child()).toBe(a);
    expect(root.child(2)).toBe(group);
    expect(root.child(-1)).toBe(c);
    expect(root.child(4)).toBeNull();
    expect(root.child(-5)).toBeNull();
  });

  it('first and last element', () => {
    const { root, a, c } = sampleTree();
    expect(root.firstElement()).toBe(a);
    expect(root.lastElement()).toBe(c);
    expect(new Node().firstElement()).toBeNull();
    expect(new Node().lastElement()).toBeNull();
  });

  it('childCount matches children().length', () => {
    const { root, group } = sampleTree();
    expect(root.childCount()).toBe(4);
    expect(group.childCount()).toBe(3);
  });

  it('content() concatenates the children', () => {
    const { root, group } = sampleTree();
    expect(root.content()).toBe('ab(d)c');
    expect(group.content()).toBe('(d)');
  });

  it('tokens() lists leaves in document order', () => {
    const { root, a, b, open, d, close, c } = sampleTree();
    expect(root.tokens()).toEqual([a, b, open, d, close, c]);
  });
});

describe('contains', () => {
  it('is true for strict descendants', () => {
    const { root, a, group, d } = sampleTree();
    expect(root.contains(a)).toBe(true);
    expect(root.contains(group)).toBe(true);
    expect(root.contains(d)).toBe(true);
    expect(group.contains(d)).toBe(true);
  });

  it('is false for the node itself', () => {
    const { root } = sampleTree();
    expect(root.contains(root)).toBe(false);
  });

  it('is false for elements outside the subtree', () => {
    const { root, group, a } = sampleTree();
    expect(group.contains(a)).toBe(false);
    expect(group.contains(root)).toBe(false);
    expect(root.contains(new Literal('a'))).toBe(false);
  });

  it('is false for non-elements', () => {
    const { root } = sampleTree();
    expect(root.contains('a')).toBe(false);
    expect(root.contains(null)).toBe(false);
    expect(root.contains(undefined)).toBe(false);
  });
});

describe('Significant children', () => {
  function layoutTree() {
    const a = new Literal('a');
    const b = new Literal('b');
    const c = new Literal('c');
    const ws1 = new Whitespace(' ');
    const note = new Comment('(?#note)');
    const ws2 = new Whitespace(' ');
    const root = new Node([ws1, a, note, b, ws2, c]);
    return { root, a, b, c, ws1, note, ws2 };
  }

  it('schild counts from the front', () => {
    const { root, a, b, c } = layoutTree();
    expect(root.schild()).toBe(a);
    expect(root.schild(0)).toBe(a);
    expect(root.schild(1)).toBe(b);
    expect(root.schild(2)).toBe(c);
    expect(root.schild(3)).toBeNull();
  });

  it('schild counts from the back for negative indices', () => {
    const { root, a, b, c } = layoutTree();
    expect(root.schild(-1)).toBe(c);
    expect(root.schild(-2)).toBe(b);
    expect(root.schild(-3)).toBe(a);
    expect(root.schild(-4)).toBeNull();
  });

  it('schildren skips layout', () => {
    const { root, a, b, c } = layoutTree();
    expect(root.schildren()).toEqual([a, b, c]);
    expect(root.schildCount()).toBe(3);
    expect(root.childCount()).toBe(6);
  });

  it('schildren equals children when everything is significant', () => {
    const { root } = sampleTree();
    expect(root.schildren()).toEqual(root.children());
    expect(root.schildCount()).toBe(root.childCount());
  });

  it('one insignificant child lowers the count by exactly one', () => {
    const all = new Node([new Literal('a'), new Literal('b'), new Literal('c')]);
    const oneLayout = new Node([new Literal('a'), new Whitespace(' '), new Literal('c')]);
    expect(oneLayout.schildCount()).toBe(all.schildCount() - 1);
  });

  it('schild on an all-layout node is null', () => {
    const root = new Node([new Whitespace(' '), new Comment('(?#x)')]);
    expect(root.schild(0)).toBeNull();
    expect(root.schild(-1)).toBeNull();
    expect(root.schildren()).toEqual([]);
  });
});
