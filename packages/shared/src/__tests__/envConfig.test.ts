import assert from 'node:assert/strict';
import { test } from 'node:test';
import { z } from 'zod';
import { EnvConfigError, booleanVar, integerVar, loadEnvConfig, stringVar, urlVar } from '../envConfig';

const schema = z.object({
  TOKEN: stringVar({ required: true }),
  ENDPOINT: urlVar({ defaultValue: 'https://api.example.test/v1' }),
  TIMEOUT_MS: integerVar({ defaultValue: 30_000, min: 0 }),
  VERIFY: booleanVar({ defaultValue: true }),
  LEVEL: stringVar({ defaultValue: 'info', lowercase: true, oneOf: ['info', 'debug'] })
});

test('applies defaults for unset variables', () => {
  const config = loadEnvConfig(schema, { env: { TOKEN: 'test-token' } });
  assert.deepEqual(config, {
    TOKEN: 'test-token',
    ENDPOINT: 'https://api.example.test/v1',
    TIMEOUT_MS: 30_000,
    VERIFY: true,
    LEVEL: 'info'
  });
});

test('parses and normalizes provided values', () => {
  const config = loadEnvConfig(schema, {
    env: {
      TOKEN: '  test-token  ',
      ENDPOINT: 'http://localhost:8080/v1/',
      TIMEOUT_MS: '1500',
      VERIFY: 'off',
      LEVEL: 'DEBUG'
    }
  });
  assert.equal(config.TOKEN, 'test-token');
  assert.equal(config.ENDPOINT, 'http://localhost:8080/v1');
  assert.equal(config.TIMEOUT_MS, 1500);
  assert.equal(config.VERIFY, false);
  assert.equal(config.LEVEL, 'debug');
});

test('reports every invalid variable at once', () => {
  assert.throws(
    () =>
      loadEnvConfig(schema, {
        env: { TIMEOUT_MS: '-5', VERIFY: 'maybe', ENDPOINT: 'ftp://example.test' },
        context: 'test'
      }),
    (error: unknown) => {
      assert.ok(error instanceof EnvConfigError);
      assert.deepEqual(error.issues, [
        'TOKEN: Missing required TOKEN',
        'ENDPOINT: ENDPOINT must use one of: http:, https:',
        'TIMEOUT_MS: TIMEOUT_MS must be >= 0',
        'VERIFY: Invalid VERIFY. Accepted boolean values: 1, true, yes, on, 0, false, no, off'
      ]);
      assert.match(error.message, /^\[test\] Invalid environment configuration/);
      return true;
    }
  );
});

test('rejects non-integer numbers', () => {
  assert.throws(() => loadEnvConfig(schema, { env: { TOKEN: 't', TIMEOUT_MS: '1.5' } }), /Expected TIMEOUT_MS to be an integer/);
});

test('rejects values outside the allowed set', () => {
  assert.throws(() => loadEnvConfig(schema, { env: { TOKEN: 't', LEVEL: 'verbose' } }), /LEVEL must be one of: info, debug/);
});
