import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { ConfigValidator } from './ConfigValidator.js';
import { getDefaultConfig } from './defaults.js';

describe('ConfigValidator', () => {
  const validator = new ConfigValidator();

  it('accepts the default configuration', () => {
    assert.deepEqual(validator.validate(getDefaultConfig()), { valid: true });
  });

  it('accepts a numeric window limit', () => {
    const config = getDefaultConfig();
    config.window = { startFrom: 5, limit: 20 };
    assert.equal(validator.validate(config).valid, true);
  });

  it('reports the path of an out-of-range value', () => {
    const config = { ...getDefaultConfig(), workers: 0 };
    const result = validator.validate(config);
    assert.equal(result.valid, false);
    assert.deepEqual(
      result.errors?.map((e) => e.path),
      ['/workers'],
    );
  });

  it('rejects unknown sort orders', () => {
    const config = { ...getDefaultConfig(), sortOrders: ['oldest'] };
    const result = validator.validate(config);
    assert.equal(result.valid, false);
    assert.ok(result.errors?.some((e) => e.path === '/sortOrders/0'));
  });

  it('rejects unknown top-level keys at the root', () => {
    const config = { ...getDefaultConfig(), proxy: 'socks5://127.0.0.1:1080' };
    const result = validator.validate(config);
    assert.equal(result.valid, false);
    assert.ok(result.errors?.some((e) => e.path === '/root'));
  });

  it('rejects an over-fetch ratio below one', () => {
    const config = getDefaultConfig();
    const scroll = { ...config.scroll, overfetchRatio: 0.5 };
    const result = validator.validate({ ...config, scroll });
    assert.equal(result.valid, false);
    assert.ok(result.errors?.some((e) => e.path === '/scroll/overfetchRatio'));
  });

  it('returns a file error for unreadable files', async () => {
    const result = await validator.validateFile('/nonexistent/harvest.config.json');
    assert.equal(result.valid, false);
    assert.equal(result.errors?.[0]?.path, '/nonexistent/harvest.config.json');
  });
});
