export { HomeAssistantClient, ENERGY_KEYWORDS } from './api/home-assistant.js';
export type { HomeAssistantClientOptions } from './api/home-assistant.js';
export { ServerConfigResolver, FALLBACK_SERVER_NAME, resolveConfigPath, serverUrl } from './config/server-config.js';
export { CredentialStore, TUNNEL_DEFAULTS, resolveSecretsPath } from './config/secrets.js';
export type { CredentialStoreOptions } from './config/secrets.js';
export { checkDatabase, buildDatabaseDSN } from './connectors/mariadb.js';
export type { DatabaseCheckResult } from './connectors/mariadb.js';
export { createContext } from './context.js';
export type { ContextOptions, HassLinkContext } from './context.js';
export { TunnelManager } from './tunnels/manager.js';
export type { TunnelManagerOptions } from './tunnels/manager.js';
export { SSHTunnel } from './utils/ssh-tunnel.js';
export type { SSHTunnelDependencies, SpawnFunction, TunnelProcess } from './utils/ssh-tunnel.js';
export { probePort, readGreeting, looksLikeDatabaseGreeting } from './utils/tcp-probe.js';
export type { ProbeResult } from './utils/tcp-probe.js';
export {
  HassLinkError,
  NotFoundError,
  MissingCredentialError,
  MisconfiguredError,
  HttpError,
  ProcessError,
} from './utils/errors.js';
export type { HassLinkErrorCode } from './utils/errors.js';
export type * from './types/config.js';
export type * from './types/home-assistant.js';
export type * from './types/ssh.js';
