import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { PartnershipError } from '../src/errors';
import { sha256Hex, verifyPartnershipToken } from '../src/partnership';

const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'stalked-token-'));
const tokenPath = path.join(dir, 'TOKEN');
fs.writeFileSync(tokenPath, 'test-secret\n', 'utf8');

test.after(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

test('sha256Hex', () => {
  assert.equal(sha256Hex('abc'), 'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
});

test('a token matching the digest passes, in either case', () => {
  const digest = sha256Hex('test-secret');
  assert.doesNotThrow(() => verifyPartnershipToken(tokenPath, digest));
  assert.doesNotThrow(() => verifyPartnershipToken(tokenPath, digest.toUpperCase()));
});

test('a token with the wrong digest is refused', () => {
  assert.throws(
    () => verifyPartnershipToken(tokenPath, sha256Hex('other-secret')),
    (err: unknown) => err instanceof PartnershipError && /Invalid partnership token/.test(err.message)
  );
});

test('no digest configured is refused', () => {
  assert.throws(() => verifyPartnershipToken(tokenPath, undefined), /No partnership digest/);
  assert.throws(() => verifyPartnershipToken(tokenPath, 'not-hex'), /No partnership digest/);
});

test('a missing token file is refused', () => {
  assert.throws(
    () => verifyPartnershipToken(path.join(dir, 'MISSING'), sha256Hex('test-secret')),
    /not found/
  );
});
