import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { EventEmitter } from 'events';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { Command } from 'commander';
import { registerApiCommands } from '../commands/api.js';
import { createContext } from '../../context.js';
import type { HassLinkContext } from '../../context.js';
import type { SpawnFunction, TunnelProcess } from '../../utils/ssh-tunnel.js';
import { closedPort } from '../../utils/__tests__/tcp-server.js';

class FakeProcess extends EventEmitter implements TunnelProcess {
  pid = 6161;
  stderr = null;
  kill = vi.fn((_signal?: NodeJS.Signals) => true);
}

describe('test-connection command', () => {
  let tempDir: string;
  let context: HassLinkContext;
  let children: FakeProcess[];

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});

    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'hass-link-cli-'));
    const configPath = path.join(tempDir, 'config.toml');
    const secretsPath = path.join(tempDir, 'secrets.toml');
    fs.writeFileSync(configPath, '[servers.home]\nhost = "ha.lan"\nport = 8123\n');
    fs.writeFileSync(
      secretsPath,
      `[servers.home]\ntoken = "test-secret"\n\n[servers.home.ssh_tunnel]\nhost = "ha-box"\nlocal_port = ${await closedPort()}\n`,
      { mode: 0o600 }
    );
    fs.chmodSync(secretsPath, 0o600);

    children = [];
    const spawn = vi.fn<SpawnFunction>(() => {
      const child = new FakeProcess();
      children.push(child);
      process.nextTick(() => child.emit('spawn'));
      return child;
    });
    context = createContext({
      configPath,
      secretsPath,
      sshConfigPath: path.join(tempDir, 'ssh_config'),
      fetch: vi.fn<typeof fetch>(async () => new Response(JSON.stringify({ location_name: 'Home', version: '2024.6.1' }))),
      tunnelDependencies: { spawn, sleep: async () => {}, killMatching: async () => {} },
    });
  });

  afterEach(() => {
    process.exitCode = undefined;
    vi.restoreAllMocks();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  const run = async (...args: string[]) => {
    const program = new Command();
    registerApiCommands(program, () => context);
    await program.parseAsync(args, { from: 'user' });
  };

  it('should release the tunnels it opened before finishing', async () => {
    const stopAll = vi.spyOn(context.tunnels, 'stopAll');

    await run('test-connection');

    expect(stopAll).toHaveBeenCalledTimes(1);
    expect(children).toHaveLength(1);
    expect(children[0].kill).toHaveBeenCalledWith('SIGTERM');
    expect(context.tunnels.get().getPid()).toBeUndefined();
    expect(process.exitCode).toBe(1);
  });
});
