import fs from 'node:fs';
import { createHash, timingSafeEqual } from 'node:crypto';
import { PartnershipError } from './errors';

export function sha256Hex(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

/**
 * Unlimited capacity (max players 0) needs a partnership token. The TOKEN
 * file's trimmed contents must hash to the configured SHA-256 digest.
 * Throws PartnershipError otherwise.
 */
export function verifyPartnershipToken(tokenPath: string, expectedDigest: string | undefined): void {
  const expected = expectedDigest?.trim().toLowerCase() ?? '';
  if (!/^[0-9a-f]{64}$/.test(expected)) {
    throw new PartnershipError('No partnership digest configured (STALKED_PARTNER_DIGEST).');
  }

  let token: string;
  try {
    token = fs.readFileSync(tokenPath, 'utf8').trim();
  } catch {
    throw new PartnershipError(`Partnership token file '${tokenPath}' not found.`);
  }

  const actual = Buffer.from(sha256Hex(token), 'hex');
  if (!timingSafeEqual(actual, Buffer.from(expected, 'hex'))) {
    throw new PartnershipError('Invalid partnership token!');
  }
}
