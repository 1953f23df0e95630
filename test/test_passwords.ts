import tap from 'tap';
import bcrypt from 'bcryptjs';
import { BCRYPT_MAX_BYTES, fallbackHash, hashPassword, verifyPassword } from '../src/common/passwords.js';

tap.test('hashPassword - bcrypt hash that verifies', async t => {
  const hash = await hashPassword('correct horse');
  t.match(hash, /^\$2[aby]\$12\$/, 'should be a bcrypt hash with cost 12');
  t.equal(await verifyPassword('correct horse', hash), true, 'right password verifies');
  t.equal(await verifyPassword('wrong horse', hash), false, 'wrong password does not');
});

tap.test('hashPassword - passwords over 72 bytes are not truncated', async t => {
  const base = 'a'.repeat(BCRYPT_MAX_BYTES);
  const hash = await hashPassword(base + 'X');
  t.equal(await verifyPassword(base + 'X', hash), true, 'long password verifies');
  t.equal(await verifyPassword(base + 'Y', hash), false, 'difference after byte 72 is detected');
  t.equal(await verifyPassword(base, hash), false, 'the 72-byte prefix alone does not verify');
});

tap.test('hashPassword - byte length, not character count, decides pre-digesting', async t => {
  // 25 three-byte characters = 75 bytes
  const multibyte = '日'.repeat(25);
  const hash = await hashPassword(multibyte);
  t.equal(await verifyPassword(multibyte, hash), true);
  t.equal(await verifyPassword('日'.repeat(24) + '本', hash), false);
});

tap.test('verifyPassword - salted sha256 fallback format', async t => {
  const hash = fallbackHash('secret-pass', 'abc123');
  t.match(hash, /^sha256:abc123:[0-9a-f]{64}$/, 'should have sha256:salt:hex form');
  t.equal(await verifyPassword('secret-pass', hash), true);
  t.equal(await verifyPassword('secret-pas', hash), false);
});

tap.test('fallbackHash - random salt differs per call', async t => {
  const a = fallbackHash('same');
  const b = fallbackHash('same');
  t.not(a, b, 'salts should differ');
  t.equal(await verifyPassword('same', a), true);
  t.equal(await verifyPassword('same', b), true);
});

tap.test('verifyPassword - malformed hashes verify false without throwing', async t => {
  t.equal(await verifyPassword('anything', 'not-a-hash'), false);
  t.equal(await verifyPassword('anything', ''), false);
  t.equal(await verifyPassword('anything', 'sha256:only-two'), false);
  t.equal(await verifyPassword('anything', 'sha256:a:b:c'), false);
});

tap.test('verifyPassword - accepts hashes made by plain bcrypt', async t => {
  const hash = bcrypt.hashSync('legacy-pass', 4);
  t.equal(await verifyPassword('legacy-pass', hash), true);
});
