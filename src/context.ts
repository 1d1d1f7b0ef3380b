import { HomeAssistantClient } from './api/home-assistant.js';
import { CredentialStore } from './config/secrets.js';
import { ServerConfigResolver } from './config/server-config.js';
import { TunnelManager } from './tunnels/manager.js';
import type { SSHTunnelDependencies } from './utils/ssh-tunnel.js';

export interface ContextOptions {
  configPath?: string;
  secretsPath?: string;
  sshConfigPath?: string;
  tunnelDependencies?: SSHTunnelDependencies;
  fetch?: typeof fetch;
}

/**
 * Everything a caller needs, wired from one config/secrets pair. Nothing is
 * read from disk until first used.
 */
export interface HassLinkContext {
  resolver: ServerConfigResolver;
  credentials: CredentialStore;
  tunnels: TunnelManager;
  client(serverName?: string): HomeAssistantClient;
}

export function createContext(options: ContextOptions = {}): HassLinkContext {
  const resolver = new ServerConfigResolver(options.configPath);
  const credentials = new CredentialStore(resolver, {
    secretsPath: options.secretsPath,
    sshConfigPath: options.sshConfigPath,
  });
  const tunnels = new TunnelManager(resolver, credentials, {
    dependencies: options.tunnelDependencies,
  });

  return {
    resolver,
    credentials,
    tunnels,
    client: (serverName?: string) =>
      new HomeAssistantClient({ serverName, resolver, credentials, fetch: options.fetch }),
  };
}
