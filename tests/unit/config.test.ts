import { describe, it, expect, afterEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import { loadConfig } from '../../src/config/index.js';

describe('config loader', () => {
  afterEach(() => {
    delete process.env.CREDENTIAL_PREFIX;
    delete process.env.PERMISSION_ANONYMOUS;
  });

  it('loads defaults when file missing', () => {
    const cfg = loadConfig('nonexistent-config.json');
    expect(cfg.database.client).toBe('better-sqlite3');
    expect(cfg.credentials).toEqual({ prefix: 'rgw', defaultLifetimeDays: 90 });
    expect(cfg.permissions).toEqual({ anonymous: 'allow', undeclaredPolicy: 'allow', unknownAction: 'allow' });
    expect(cfg.limits.listDefault).toBe(100);
    expect(cfg.limits.bulkMax).toBe(500);
  });

  it('reads overrides from the environment', () => {
    process.env.CREDENTIAL_PREFIX = 'acme';
    process.env.PERMISSION_ANONYMOUS = 'deny';
    const cfg = loadConfig('nonexistent-config.json');
    expect(cfg.credentials.prefix).toBe('acme');
    expect(cfg.permissions.anonymous).toBe('deny');
  });

  it('merges the config file over defaults', () => {
    const tmp = path.join(process.cwd(), 'gateway-test-config.json');
    fs.writeFileSync(tmp, JSON.stringify({ limits: { bulkMax: 10 }, permissions: { unknownAction: 'deny' } }));
    try {
      const cfg = loadConfig('gateway-test-config.json');
      expect(cfg.limits.bulkMax).toBe(10);
      expect(cfg.limits.listMax).toBe(1000);
      expect(cfg.permissions.unknownAction).toBe('deny');
      expect(cfg.permissions.anonymous).toBe('allow');
    } finally {
      fs.unlinkSync(tmp);
    }
  });

  it('rejects an invalid credential prefix', () => {
    process.env.CREDENTIAL_PREFIX = 'Not_Valid';
    expect(() => loadConfig('nonexistent-config.json')).toThrow(/prefix must be lowercase alphanumeric/);
  });
});
