import test from 'node:test';
import assert from 'node:assert/strict';
import { useTestEnv } from '../../tests/helpers/test-env.js';

useTestEnv();
const { decrypt, encrypt } = await import('./encryption.js');

test('encrypt and decrypt restore the secret', () => {
  const payload = encrypt('{"account":"xy12345","password":"test-secret"}');
  assert.match(payload, /^[0-9a-f]{24}:[0-9a-f]{32}:[0-9a-f]+$/);
  assert.equal(decrypt(payload), '{"account":"xy12345","password":"test-secret"}');
});

test('encrypt uses a fresh IV every time', () => {
  assert.notEqual(encrypt('same'), encrypt('same'));
});

test('decrypt rejects malformed and tampered payloads', () => {
  assert.throws(() => decrypt('not-encrypted'), /malformed/);

  const [iv, tag, data] = encrypt('profile').split(':');
  const flipped = data.startsWith('0') ? `1${data.slice(1)}` : `0${data.slice(1)}`;
  assert.throws(() => decrypt(`${iv}:${tag}:${flipped}`));
});
