import fs from 'fs';
import path from 'path';
import { SecretsFileSchema } from '../types/config.js';
import type { Credentials, DatabaseConfig, SecretsFile, ServerSecrets } from '../types/config.js';
import type { TunnelConfig } from '../types/ssh.js';
import { MisconfiguredError, MissingCredentialError, NotFoundError } from '../utils/errors.js';
import { DEFAULT_SSH_CONFIG_PATH, parseSSHConfig } from '../utils/ssh-config-parser.js';
import { ServerConfigResolver, serverUrl } from './server-config.js';
import { expandHomeDir, findUpwards, loadTomlFile } from './toml-loader.js';

const SECRETS_RELATIVE_PATH = path.join('config', 'secrets.toml');

/** Tunnel defaults for fields neither secrets.toml nor ~/.ssh/config provide */
export const TUNNEL_DEFAULTS = {
  port: 22,
  user: 'root',
  remoteHost: 'core-mariadb',
  remotePort: 3306,
  localPort: 3306,
} as const;

/**
 * Resolve the path to secrets.toml
 * Priority: HASS_LINK_SECRETS env > nearest config/secrets.toml walking up from cwd
 * > ./config/secrets.toml (which may not exist yet)
 */
export function resolveSecretsPath(): string {
  const fromEnv = process.env.HASS_LINK_SECRETS;
  if (fromEnv) {
    return expandHomeDir(fromEnv);
  }
  return findUpwards(SECRETS_RELATIVE_PATH) ?? path.join(process.cwd(), SECRETS_RELATIVE_PATH);
}

export interface CredentialStoreOptions {
  secretsPath?: string;
  /** Path of the SSH client config consulted for tunnel hosts */
  sshConfigPath?: string;
}

/**
 * Per-server secrets, kept apart from the non-secret config.
 * Nothing read from the secrets file is ever logged.
 */
export class CredentialStore {
  private readonly resolver: ServerConfigResolver;
  private readonly secretsPath: string;
  private readonly sshConfigPath: string;
  private cached: SecretsFile | null = null;

  constructor(resolver: ServerConfigResolver, options: CredentialStoreOptions = {}) {
    this.resolver = resolver;
    this.secretsPath = options.secretsPath ?? resolveSecretsPath();
    this.sshConfigPath = options.sshConfigPath ?? DEFAULT_SSH_CONFIG_PATH;
  }

  getSecretsPath(): string {
    return this.secretsPath;
  }

  loadSecrets(): SecretsFile {
    if (this.cached) {
      return this.cached;
    }
    if (!fs.existsSync(this.secretsPath)) {
      throw new NotFoundError(
        `Secrets file not found: ${this.secretsPath}\n` +
          `Copy config/secrets.example.toml to config/secrets.toml and add your credentials.`
      );
    }
    this.warnIfExposed();
    this.cached = loadTomlFile(this.secretsPath, SecretsFileSchema);
    return this.cached;
  }

  /**
   * Hub URL and API token for a server
   */
  credentials(serverName?: string): Credentials {
    const server = this.resolver.serverConfig(serverName);
    const secrets = this.serverSecrets(server.name);

    const url = serverUrl(server) ?? secrets.url;
    if (!url) {
      throw new MissingCredentialError(
        `No URL for server '${server.name}'. Set host and port under [servers.${server.name}] ` +
          `in ${this.resolver.getConfigPath()} or url under [servers.${server.name}] in ${this.secretsPath}`
      );
    }
    if (!secrets.token) {
      throw new MissingCredentialError(
        `Missing API token for server '${server.name}'. Set servers.${server.name}.token in ${this.secretsPath}`
      );
    }
    return { url, token: secrets.token };
  }

  databaseConfig(serverName?: string): DatabaseConfig {
    const name = this.resolveName(serverName);
    const database = this.serverSecrets(name).database;
    if (!database) {
      throw new NotFoundError(
        `No database settings for server '${name}'. Add [servers.${name}.database] to ${this.secretsPath}`
      );
    }
    return { ...database };
  }

  /**
   * SSH tunnel parameters. Fields are taken from secrets.toml first, then from
   * the matching Host block in the SSH client config, then from TUNNEL_DEFAULTS.
   */
  tunnelConfig(serverName?: string): TunnelConfig {
    const name = this.resolveName(serverName);
    const tunnel = this.serverSecrets(name).ssh_tunnel;
    if (!tunnel) {
      throw new NotFoundError(
        `No SSH tunnel settings for server '${name}'. Add [servers.${name}.ssh_tunnel] to ${this.secretsPath}`
      );
    }
    if (!tunnel.host) {
      throw new MisconfiguredError(
        `SSH tunnel host not configured for server '${name}'. Set servers.${name}.ssh_tunnel.host in ${this.secretsPath}`
      );
    }

    const fromSshConfig = parseSSHConfig(tunnel.host, this.sshConfigPath);
    const identityFile = tunnel.identity_file
      ? expandHomeDir(tunnel.identity_file)
      : fromSshConfig?.privateKey;

    const config: TunnelConfig = {
      serverName: name,
      host: tunnel.host,
      port: tunnel.port ?? fromSshConfig?.port ?? TUNNEL_DEFAULTS.port,
      user: tunnel.user ?? fromSshConfig?.username ?? TUNNEL_DEFAULTS.user,
      remoteHost: tunnel.remote_host ?? TUNNEL_DEFAULTS.remoteHost,
      remotePort: tunnel.remote_port ?? TUNNEL_DEFAULTS.remotePort,
      localPort: tunnel.local_port ?? TUNNEL_DEFAULTS.localPort,
    };
    if (identityFile) {
      config.identityFile = identityFile;
    }
    return config;
  }

  private resolveName(serverName?: string): string {
    return serverName ?? this.resolver.defaultServerName();
  }

  private serverSecrets(name: string): ServerSecrets {
    const { servers } = this.loadSecrets();
    if (!Object.prototype.hasOwnProperty.call(servers, name)) {
      throw new NotFoundError(
        `No secrets for server '${name}'. Add [servers.${name}] to ${this.secretsPath}`
      );
    }
    return servers[name];
  }

  private warnIfExposed(): void {
    if (process.platform === 'win32') {
      return;
    }
    const mode = fs.statSync(this.secretsPath).mode;
    if ((mode & 0o077) !== 0) {
      console.error(
        `[secrets] Warning: ${this.secretsPath} is readable by other users (mode ${(mode & 0o777).toString(8)}); run chmod 600 on it`
      );
    }
  }
}
