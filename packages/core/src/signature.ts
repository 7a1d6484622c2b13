import crypto from 'crypto';

export type SignatureAlgorithm = 'sha1' | 'sha256';

const DIGEST_HEX_LENGTH: Record<SignatureAlgorithm, number> = {
  sha1: 40,
  sha256: 64,
};

const HEX = /^[0-9a-f]+$/i;

function isAlgorithm(value: string): value is SignatureAlgorithm {
  return value === 'sha1' || value === 'sha256';
}

/** `algorithm=hexdigest` for `body`, as the upstream service signs it. */
export function computeSignature(algorithm: SignatureAlgorithm, secret: string, body: Buffer): string {
  const digest = crypto.createHmac(algorithm, secret).update(body).digest('hex');
  return `${algorithm}=${digest}`;
}

/**
 * Check a claimed `algorithm=hexdigest` signature against the raw request
 * body. Works on the bytes as received; a re-serialized body would not
 * reproduce the upstream digest.
 */
export function verifySignature(rawBody: Buffer, claimed: string, secret: string): boolean {
  const separator = claimed.indexOf('=');
  if (separator < 0) return false;

  const algorithm = claimed.slice(0, separator).toLowerCase();
  const providedHex = claimed.slice(separator + 1);
  if (!isAlgorithm(algorithm)) return false;
  if (providedHex.length !== DIGEST_HEX_LENGTH[algorithm] || !HEX.test(providedHex)) return false;

  const expected = crypto.createHmac(algorithm, secret).update(rawBody).digest();
  const provided = Buffer.from(providedHex, 'hex');
  return crypto.timingSafeEqual(expected, provided);
}
