import crypto from 'crypto';

// Hashing strategy: sha256(salt + secret), hex encoded.
export function hashSecret(secret: string, salt: string): string {
  return crypto.createHash('sha256').update(salt + secret).digest('hex');
}

export function randomSalt(bytes = 16): string {
  return crypto.randomBytes(bytes).toString('hex');
}

export function hashesEqual(a: string, b: string): boolean {
  const left = Buffer.from(a, 'utf8');
  const right = Buffer.from(b, 'utf8');
  if (left.length !== right.length) return false;
  return crypto.timingSafeEqual(left, right);
}
