/**
 * Jest Setup File
 *
 * Runs before all tests. Unit tests never reach AWS: clients are mocked per test file,
 * and the SDK gets placeholder credentials so nothing consults the credential chain.
 */

process.env.AWS_ACCESS_KEY_ID = 'test-key';
process.env.AWS_SECRET_ACCESS_KEY = 'test-secret';
process.env.AWS_REGION = process.env.AWS_REGION || 'us-east-1';
delete process.env.LOG_LEVEL;

// Suppress console output during tests to avoid "● Console" blocks in Jest output.
// Tests that assert on console (e.g. Logger.test.ts) can use jest.spyOn(console, 'warn') etc.
const noop = () => {};
console.warn = noop;
console.log = noop;
console.error = noop;
