import fs from 'fs';
import path from 'path';
import { ConfigFileSchema } from '../types/config.js';
import type { ConfigFile, ServerConfig } from '../types/config.js';
import { NotFoundError } from '../utils/errors.js';
import { expandHomeDir, loadTomlFile } from './toml-loader.js';

/** Server name used when config.toml does not set default_server */
export const FALLBACK_SERVER_NAME = 'home';

/**
 * Resolve the path to config.toml
 * Priority: HASS_LINK_CONFIG env > ./config/config.toml
 */
export function resolveConfigPath(): string {
  const fromEnv = process.env.HASS_LINK_CONFIG;
  if (fromEnv) {
    return expandHomeDir(fromEnv);
  }
  return path.join(process.cwd(), 'config', 'config.toml');
}

/**
 * Base URL for a server, or undefined when config.toml leaves host or port out
 */
export function serverUrl(server: ServerConfig): string | undefined {
  if (!server.host || !server.port) {
    return undefined;
  }
  return `${server.scheme}://${server.host}:${server.port}`;
}

/**
 * Named remote servers from the non-secret config file.
 * The file is read once and kept for the lifetime of the resolver.
 */
export class ServerConfigResolver {
  private readonly configPath: string;
  private cached: ConfigFile | null = null;

  constructor(configPath: string = resolveConfigPath()) {
    this.configPath = configPath;
  }

  getConfigPath(): string {
    return this.configPath;
  }

  load(): ConfigFile {
    if (this.cached) {
      return this.cached;
    }
    if (!fs.existsSync(this.configPath)) {
      throw new NotFoundError(
        `Config file not found: ${this.configPath}\n` +
          `Copy config/config.example.toml to config/config.toml and edit as needed.`
      );
    }
    this.cached = loadTomlFile(this.configPath, ConfigFileSchema);
    return this.cached;
  }

  defaultServerName(): string {
    return this.load().default_server ?? FALLBACK_SERVER_NAME;
  }

  listServers(): string[] {
    return Object.keys(this.load().servers);
  }

  hasServer(name: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.load().servers, name);
  }

  /**
   * Look up a server by name, or the default server when no name is given
   */
  serverConfig(name?: string): ServerConfig {
    const config = this.load();
    const defaultName = this.defaultServerName();
    const serverName = name ?? defaultName;

    if (!this.hasServer(serverName)) {
      const valid = this.listServers();
      throw new NotFoundError(
        `Server '${serverName}' not found in ${this.configPath}. ` +
          `Valid servers: ${valid.length > 0 ? valid.join(', ') : '(none configured)'}`
      );
    }

    const entry = config.servers[serverName];
    return {
      name: serverName,
      host: entry.host,
      port: entry.port,
      scheme: entry.scheme,
      isDefault: serverName === defaultName,
    };
  }
}
