import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { parseSSHConfig } from '../ssh-config-parser.js';
import { mkdtempSync, writeFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

describe('SSH Config Parser', () => {
  let tempDir: string;
  let configPath: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'hass-link-ssh-test-'));
    configPath = join(tempDir, 'config');
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(tempDir, { recursive: true });
  });

  describe('parseSSHConfig', () => {
    it('should parse basic SSH config', () => {
      writeFileSync(configPath, `
Host hassio
  HostName 192.168.1.100
  User root
  Port 22222
`);

      expect(parseSSHConfig('hassio', configPath)).toEqual({
        host: '192.168.1.100',
        username: 'root',
        port: 22222,
      });
    });

    it('should handle identity file', () => {
      const identityPath = join(tempDir, 'id_rsa');
      writeFileSync(identityPath, 'placeholder-key');
      writeFileSync(configPath, `
Host ha-box
  HostName ha.example.com
  User admin
  IdentityFile ${identityPath}
`);

      expect(parseSSHConfig('ha-box', configPath)).toEqual({
        host: 'ha.example.com',
        username: 'admin',
        privateKey: identityPath,
      });
    });

    it('should use the first of multiple identity files', () => {
      const identityPath1 = join(tempDir, 'id_rsa');
      const identityPath2 = join(tempDir, 'id_ed25519');
      writeFileSync(identityPath1, 'placeholder-key-1');
      writeFileSync(identityPath2, 'placeholder-key-2');
      writeFileSync(configPath, `
Host multi-key
  HostName multi.example.com
  User multiuser
  IdentityFile ${identityPath1}
  IdentityFile ${identityPath2}
`);

      expect(parseSSHConfig('multi-key', configPath)?.privateKey).toBe(identityPath1);
    });

    it('should skip an identity file that does not exist', () => {
      writeFileSync(configPath, `
Host ha-box
  User admin
  IdentityFile ${join(tempDir, 'missing_key')}
`);

      expect(parseSSHConfig('ha-box', configPath)).toEqual({
        host: 'ha-box',
        username: 'admin',
      });
    });

    it('should handle wildcard patterns', () => {
      writeFileSync(configPath, `
Host *.example.com
  User defaultuser
  Port 2222

Host prod.example.com
  HostName 10.0.0.100
`);

      expect(parseSSHConfig('prod.example.com', configPath)).toEqual({
        host: '10.0.0.100',
        username: 'defaultuser',
        port: 2222,
      });
    });

    it('should use host alias as hostname if HostName not specified', () => {
      writeFileSync(configPath, `
Host myalias
  User testuser
`);

      expect(parseSSHConfig('myalias', configPath)).toEqual({
        host: 'myalias',
        username: 'testuser',
      });
    });

    it('should return a port-only entry without a user', () => {
      writeFileSync(configPath, `
Host portonly
  Port 2200
`);

      expect(parseSSHConfig('portonly', configPath)).toEqual({
        host: 'portonly',
        port: 2200,
      });
    });

    it('should return null for non-existent host', () => {
      writeFileSync(configPath, `
Host myserver
  HostName 192.168.1.100
  User johndoe
`);

      expect(parseSSHConfig('nonexistent', configPath)).toBeNull();
    });

    it('should return null if config file does not exist', () => {
      expect(parseSSHConfig('myserver', '/non/existent/path')).toBeNull();
    });

    it('should log and leave proxy settings to the ssh client', () => {
      const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      writeFileSync(configPath, `
Host behind-jump
  HostName 10.0.0.5
  ProxyJump bastion
`);

      expect(parseSSHConfig('behind-jump', configPath)).toEqual({ host: '10.0.0.5' });
      expect(errorSpy).toHaveBeenCalledWith(
        "[ssh-config] ProxyJump/ProxyCommand for 'behind-jump' is left to the ssh client"
      );
    });
  });
});
