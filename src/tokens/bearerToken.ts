import crypto from 'crypto';

/**
 * Bearer credential codec.
 * Format: PREFIX_<16-char-hex key>_<base64url secret>
 * Example: rgw_9f86d081884c7d65_q0Cz3m...
 *
 * The key is public and used for lookup; only the secret is hashed.
 * base64url may itself contain `_`, so everything after the key is the secret.
 */
export interface GeneratedToken {
  plaintext: string;
  key: string;
  secret: string;
}

export interface ParsedToken {
  prefix: string;
  key: string;
  secret: string;
}

const KEY_PATTERN = /^[0-9a-f]{16}$/;

export class BearerTokenGenerator {
  constructor(readonly prefix = 'rgw') {}

  generate(): GeneratedToken {
    return this.withKey(crypto.randomBytes(8).toString('hex'));
  }

  /** Fresh secret under an existing key. */
  withKey(key: string): GeneratedToken {
    const secret = crypto.randomBytes(32).toString('base64url');
    return { plaintext: `${this.prefix}_${key}_${secret}`, key, secret };
  }

  parse(presented: string): ParsedToken | null {
    const [prefix, key, ...rest] = presented.trim().split('_');
    const secret = rest.join('_');
    if (prefix !== this.prefix || !key || !KEY_PATTERN.test(key) || !secret) return null;
    return { prefix, key, secret };
  }
}
