import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { describe, it, expect } from 'vitest';
import { applyConfigChange } from '../src/infra/watcher.js';
import { createTestBridge, silentLogger } from './helpers.js';

function configFile(content: string): string {
  const file = path.join(mkdtempSync(path.join(tmpdir(), 'tasklink-watch-')), 'config.json');
  writeFileSync(file, content);
  return file;
}

describe('applyConfigChange', () => {
  it('replaces and verifies a new token', async () => {
    const { bridge, backend } = createTestBridge();
    bridge.store.invalidateCredential('backend rejected credential (401)');
    backend.validToken = 'test-secret-2';
    const file = configFile(JSON.stringify({ api_token: 'test-secret-2' }));

    expect(await applyConfigChange(file, bridge, silentLogger())).toBe(true);
    expect(bridge.store.getSession().token).toBe('test-secret-2');
    expect(bridge.store.status().auth).toEqual({
      valid: true,
      account: { email: 'agent@example.com', apiVersion: '1.2.0' }
    });
    expect(backend.hits('GET /account')[0]?.authorization).toBe('Bearer test-secret-2');
  });

  it('ignores a file whose token did not change', async () => {
    const { bridge, backend } = createTestBridge();
    const file = configFile(JSON.stringify({ api_token: 'test-secret' }));

    expect(await applyConfigChange(file, bridge, silentLogger())).toBe(false);
    expect(backend.requests).toHaveLength(0);
  });

  it('ignores a file without a token', async () => {
    const { bridge } = createTestBridge();
    const file = configFile(JSON.stringify({ project_id: 'P1' }));
    expect(await applyConfigChange(file, bridge, silentLogger())).toBe(false);
  });

  it('keeps the current credential when the file is not JSON', async () => {
    const { bridge } = createTestBridge();
    const file = configFile('{ half written');

    expect(await applyConfigChange(file, bridge, silentLogger())).toBe(false);
    expect(bridge.store.getSession().token).toBe('test-secret');
  });

  it('keeps a replaced token the backend rejects, marked invalid', async () => {
    const { bridge } = createTestBridge();
    const file = configFile(JSON.stringify({ api_token: 'test-secret-wrong' }));

    expect(await applyConfigChange(file, bridge, silentLogger())).toBe(true);
    expect(bridge.store.getSession().token).toBe('test-secret-wrong');
    expect(bridge.store.isAuthenticated()).toBe(false);
    expect(bridge.store.getSession().invalidReason).toBe('backend rejected credential (401)');
  });
});
