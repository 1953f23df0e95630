import tap from 'tap';
import { checkRateLimit, closeRateLimiter, initRateLimiter, trackedKeyCount } from '../src/rate_limit.js';

tap.afterEach(async () => {
  await closeRateLimiter();
});

tap.test('Rate Limit: not initialised (fail-open)', async t => {
  t.equal(await checkRateLimit('1.2.3.4', 1000), null, 'should return null when not initialised');
});

tap.test('Rate Limit: ten requests per window, the eleventh is rejected', async t => {
  await initRateLimiter();
  const start = 1_000_000;
  for (let i = 0; i < 10; i++) {
    const result = await checkRateLimit('client-a', start + i);
    t.equal(result?.allowed, true, `request ${i + 1} allowed`);
    t.equal(result?.remaining, 9 - i);
  }
  const rejected = await checkRateLimit('client-a', start + 10);
  t.same(rejected, { allowed: false, remaining: 0, resetAt: start + 60_000 });
});

tap.test('Rate Limit: keys are independent', async t => {
  await initRateLimiter({ maxRequests: 1 });
  t.equal((await checkRateLimit('client-a', 5000))?.allowed, true);
  t.equal((await checkRateLimit('client-a', 5001))?.allowed, false);
  t.equal((await checkRateLimit('client-b', 5002))?.allowed, true);
});

tap.test('Rate Limit: the window slides', async t => {
  await initRateLimiter({ maxRequests: 2, windowMs: 1000 });
  t.equal((await checkRateLimit('k', 0))?.allowed, true);
  t.equal((await checkRateLimit('k', 500))?.allowed, true);
  t.equal((await checkRateLimit('k', 900))?.allowed, false);
  // hit at 0 drops out once the window start passes it
  const later = await checkRateLimit('k', 1001);
  t.equal(later?.allowed, true);
  t.equal(later?.remaining, 0);
  t.equal(later?.resetAt, 1500);
});

tap.test('Rate Limit: rejected requests are not counted', async t => {
  await initRateLimiter({ maxRequests: 1, windowMs: 1000 });
  t.equal((await checkRateLimit('k', 0))?.allowed, true);
  for (let i = 1; i < 10; i++) {
    t.equal((await checkRateLimit('k', i * 100))?.allowed, false);
  }
  t.equal((await checkRateLimit('k', 1000))?.allowed, true, 'allowed once the first hit leaves the window');
});

tap.test('Rate Limit: idle clients are forgotten once the window passes', async t => {
  await initRateLimiter({ maxRequests: 1, windowMs: 1000 });
  await checkRateLimit('client-a', 1000);
  await checkRateLimit('client-b', 1100);
  await checkRateLimit('client-b', 1200);
  t.equal(trackedKeyCount(), 2);
  await checkRateLimit('client-c', 1500);
  t.equal(trackedKeyCount(), 3, 'still inside the window');
  await checkRateLimit('client-d', 2600);
  t.equal(trackedKeyCount(), 1, 'only the new client remains');
  t.equal((await checkRateLimit('client-a', 2700))?.allowed, true);
});

tap.test('Rate Limit: close resets state', async t => {
  await initRateLimiter({ maxRequests: 1 });
  await checkRateLimit('k', 0);
  await closeRateLimiter();
  t.equal(await checkRateLimit('k', 1), null);
  await initRateLimiter({ maxRequests: 1 });
  t.equal((await checkRateLimit('k', 2))?.allowed, true);
});
