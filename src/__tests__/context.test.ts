import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { createContext } from '../context.js';

describe('createContext', () => {
  let tempDir: string;
  let configPath: string;
  let secretsPath: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'hass-link-context-'));
    configPath = path.join(tempDir, 'config.toml');
    secretsPath = path.join(tempDir, 'secrets.toml');
    fs.writeFileSync(configPath, 'default_server = "cabin"\n\n[servers.cabin]\nhost = "cabin.lan"\nport = 8123\n');
    fs.writeFileSync(
      secretsPath,
      '[servers.cabin]\ntoken = "test-secret"\n\n[servers.cabin.ssh_tunnel]\nhost = "cabin-box"\n',
      { mode: 0o600 }
    );
    fs.chmodSync(secretsPath, 0o600);
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should not touch the files until something is used', () => {
    const context = createContext({ configPath: path.join(tempDir, 'missing.toml'), secretsPath });

    expect(context.tunnels.size).toBe(0);
    expect(context.resolver.getConfigPath()).toBe(path.join(tempDir, 'missing.toml'));
  });

  it('should build clients for the default server with the injected fetch', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => new Response('[]', { status: 200 }));
    const context = createContext({ configPath, secretsPath, fetch: fetchMock });

    const client = context.client();
    await client.getStates();

    expect(client.url).toBe('http://cabin.lan:8123');
    expect(String(fetchMock.mock.calls[0][0])).toBe('http://cabin.lan:8123/api/states');
  });

  it('should share one credential store between the client and the tunnels', () => {
    const context = createContext({ configPath, secretsPath, sshConfigPath: path.join(tempDir, 'ssh_config') });

    expect(context.tunnels.get().getConfig()).toMatchObject({ serverName: 'cabin', host: 'cabin-box' });
    expect(context.credentials.getSecretsPath()).toBe(secretsPath);
  });
});
