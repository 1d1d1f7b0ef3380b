/**
 * Configuration types for the TOML config and secrets files
 */
import { z } from 'zod';

const portSchema = z.number().int().min(1).max(65535);

/**
 * One [servers.<name>] table in config.toml
 */
export const ServerEntrySchema = z.object({
  host: z.string().min(1).optional(),
  port: portSchema.optional(),
  scheme: z.enum(['http', 'https']).default('http'),
});

/**
 * Complete config.toml structure
 */
export const ConfigFileSchema = z.object({
  default_server: z.string().min(1).optional(),
  servers: z.record(ServerEntrySchema).default({}),
});

export type ConfigFile = z.output<typeof ConfigFileSchema>;

/**
 * [servers.<name>.database] in secrets.toml
 */
export const DatabaseSecretsSchema = z.object({
  user: z.string().min(1),
  password: z.string(),
  host: z.string().min(1).default('127.0.0.1'),
  port: portSchema.default(3306),
  database: z.string().min(1).default('homeassistant'),
});

/**
 * [servers.<name>.ssh_tunnel] in secrets.toml. Only `host` is required,
 * and that is checked when the tunnel config is requested.
 */
export const SSHTunnelSecretsSchema = z.object({
  host: z.string().min(1).optional(),
  port: portSchema.optional(),
  user: z.string().min(1).optional(),
  identity_file: z.string().min(1).optional(),
  remote_host: z.string().min(1).optional(),
  remote_port: portSchema.optional(),
  local_port: portSchema.optional(),
});

export const ServerSecretsSchema = z.object({
  token: z.string().min(1).optional(),
  url: z.string().url().optional(),
  database: DatabaseSecretsSchema.optional(),
  ssh_tunnel: SSHTunnelSecretsSchema.optional(),
});

/**
 * Complete secrets.toml structure
 */
export const SecretsFileSchema = z.object({
  servers: z.record(ServerSecretsSchema).default({}),
});

export type SecretsFile = z.output<typeof SecretsFileSchema>;
export type ServerSecrets = z.output<typeof ServerSecretsSchema>;
export type SSHTunnelSecrets = z.output<typeof SSHTunnelSecretsSchema>;

/**
 * A named remote server as resolved from config.toml
 */
export interface ServerConfig {
  name: string;
  host?: string;
  port?: number;
  scheme: 'http' | 'https';
  isDefault: boolean;
}

export interface Credentials {
  url: string;
  token: string;
}

/**
 * Database connection parameters, as seen from this machine (normally the
 * local end of the SSH tunnel)
 */
export type DatabaseConfig = z.output<typeof DatabaseSecretsSchema>;
