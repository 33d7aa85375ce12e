/**
 * Registry of kind names ("Rx::Token::Literal") and the element classes
 * they stand for. Element modules register themselves here when they load.
 */

export type KindClass = abstract new (...args: never[]) => object;

const registry = new Map<string, KindClass>();
const names = new Map<object, string>();

export function registerKind(name: string, cls: KindClass): void {
  registry.set(name, cls);
  names.set(cls, name);
}

export function lookupKind(name: string): KindClass | undefined {
  return registry.get(name);
}

/** Kind name of a class, or of its nearest registered ancestor. */
export function kindOf(cls: object): string | undefined {
  let c: object | null = cls;
  while (c) {
    const name = names.get(c);
    if (name !== undefined) return name;
    c = Object.getPrototypeOf(c);
  }
  return undefined;
}
