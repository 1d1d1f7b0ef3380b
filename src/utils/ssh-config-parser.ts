import { readFileSync, existsSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import SSHConfig from 'ssh-config';
import type { SSHTunnelConfig } from '../types/ssh.js';

/**
 * Default location of the user's SSH client configuration
 */
export const DEFAULT_SSH_CONFIG_PATH = join(homedir(), '.ssh', 'config');

/**
 * Expand tilde (~) in file paths to home directory
 */
function expandTilde(filePath: string): string {
  if (filePath.startsWith('~/')) {
    return join(homedir(), filePath.substring(2));
  }
  return filePath;
}

/**
 * SSH config values may repeat (IdentityFile); the first one wins, as in ssh(1)
 */
function firstValue(value: string | string[] | undefined): string | undefined {
  if (Array.isArray(value)) {
    return value[0];
  }
  return value;
}

/**
 * Parse SSH config file and extract configuration for a specific host
 * @param hostAlias The host alias to look up in the SSH config
 * @param configPath Path to SSH config file
 * @returns SSH tunnel configuration or null if the file has nothing for this host
 */
export function parseSSHConfig(
  hostAlias: string,
  configPath: string = DEFAULT_SSH_CONFIG_PATH
): SSHTunnelConfig | null {
  if (!existsSync(configPath)) {
    return null;
  }

  try {
    const config = SSHConfig.parse(readFileSync(configPath, 'utf8'));
    const hostConfig = config.compute(hostAlias);

    const hostName = firstValue(hostConfig.HostName);
    const user = firstValue(hostConfig.User);
    const port = firstValue(hostConfig.Port);
    const identityFile = firstValue(hostConfig.IdentityFile);

    // Only Include directives or nothing at all for this host
    if (!hostName && !user && !port && !identityFile) {
      return null;
    }

    // If no HostName specified, use the host alias itself
    const sshConfig: SSHTunnelConfig = { host: hostName ?? hostAlias };

    if (port) {
      const parsedPort = parseInt(port, 10);
      if (!Number.isNaN(parsedPort)) {
        sshConfig.port = parsedPort;
      }
    }

    if (user) {
      sshConfig.username = user;
    }

    if (identityFile) {
      const expandedPath = expandTilde(identityFile);
      if (existsSync(expandedPath)) {
        sshConfig.privateKey = expandedPath;
      }
    }

    if (hostConfig.ProxyJump || hostConfig.ProxyCommand) {
      console.error(`[ssh-config] ProxyJump/ProxyCommand for '${hostAlias}' is left to the ssh client`);
    }

    return sshConfig;
  } catch (error) {
    console.error(`[ssh-config] Error parsing ${configPath}: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }
}
