import { afterEach, test } from 'node:test';
import assert from 'node:assert';
import { getDefaultConfig, resetDefaultConfig, resolveConfig, setDefaultConfig } from '../../src/config.js';
import { ArgumentError } from '../../src/errors.js';

afterEach(() => {
  resetDefaultConfig();
});

test('defaults apply when nothing is set', () => {
  const config = resolveConfig({}, {});
  assert.strictEqual(config.maxWidth, 16384);
  assert.strictEqual(config.maxHeight, 16384);
  assert.strictEqual(config.jpegQuality, 85);
  assert.ok(config.concurrency >= 1 && config.concurrency <= 16);
});

test('reads environment variables and lets overrides win', () => {
  const env = { RASTERKIT_MAX_WIDTH: '800', RASTERKIT_CONCURRENCY: '3', RASTERKIT_JPEG_QUALITY: ' ' };
  const config = resolveConfig({ maxHeight: 600 }, env);
  assert.strictEqual(config.maxWidth, 800);
  assert.strictEqual(config.maxHeight, 600);
  assert.strictEqual(config.concurrency, 3);
  assert.strictEqual(config.jpegQuality, 85);

  assert.strictEqual(resolveConfig({ maxWidth: 100 }, env).maxWidth, 100);
});

test('rejects invalid values with the validation issues', () => {
  assert.throws(
    () => resolveConfig({}, { RASTERKIT_MAX_WIDTH: 'wide' }),
    (error: unknown) => {
      if (!(error instanceof ArgumentError) || error.message !== 'Invalid configuration') return false;
      const issues = error.metadata?.issues;
      return Array.isArray(issues) && issues.length === 1;
    }
  );
  assert.throws(() => resolveConfig({ concurrency: 17 }, {}), ArgumentError);
  assert.throws(() => resolveConfig({ jpegQuality: 0 }, {}), ArgumentError);
  assert.throws(() => resolveConfig({ maxWidth: 1.5 }, {}), ArgumentError);
});

test('default config is cached until reset', () => {
  const first = getDefaultConfig();
  assert.strictEqual(getDefaultConfig(), first);

  const updated = setDefaultConfig({ maxWidth: 10 });
  assert.strictEqual(updated.maxWidth, 10);
  assert.strictEqual(getDefaultConfig(), updated);

  resetDefaultConfig();
  assert.notStrictEqual(getDefaultConfig(), updated);
});
