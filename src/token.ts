/**
 * Leaf tokens.
 *
 * The lexer decides what each token means; this module only carries the
 * facts a container needs to aggregate: text, significance and the host
 * versions the token is valid under.
 */

import { Element } from './element.js';
import { registerKind } from './kinds.js';
import { type HostVersion, MINIMUM_HOST_VERSION } from './version.js';

export interface TokenOptions {
  versionIntroduced?: HostVersion;
  versionRemoved?: HostVersion;
}

export class Token extends Element {
  private readonly text: string;
  private readonly introduced: HostVersion;
  private readonly removed: HostVersion | undefined;

  constructor(content: string, options: TokenOptions = {}) {
    super();
    this.text = content;
    this.introduced = options.versionIntroduced ?? MINIMUM_HOST_VERSION;
    this.removed = options.versionRemoved;
  }

  content(): string {
    return this.text;
  }

  tokens(): Token[] {
    return [this];
  }

  versionIntroduced(): HostVersion {
    return this.introduced;
  }

  versionRemoved(): HostVersion | undefined {
    return this.removed;
  }
}

export class Literal extends Token {}

export class Operator extends Token {}

export class Whitespace extends Token {
  significant(): boolean {
    return false;
  }
}

/** Inline (?#...) comment. */
export class Comment extends Token {
  significant(): boolean {
    return false;
  }
}

/** Text the lexer could not make sense of. */
export class Unknown extends Token {
  /** @internal */
  finalize(): number {
    return 1;
  }
}

registerKind('Rx::Token', Token);
registerKind('Rx::Token::Literal', Literal);
registerKind('Rx::Token::Operator', Operator);
registerKind('Rx::Token::Whitespace', Whitespace);
registerKind('Rx::Token::Comment', Comment);
registerKind('Rx::Token::Unknown', Unknown);
