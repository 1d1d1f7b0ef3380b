import type { TunnelConfig } from '../types/ssh.js';

const MASK = '*'.repeat(8);

/**
 * Obfuscates the password in a DSN string for logging purposes
 * @param dsn The original DSN string
 * @returns DSN string with password replaced by asterisks
 */
export function obfuscateDSNPassword(dsn: string): string {
  if (!dsn) {
    return dsn;
  }

  const protocolMatch = dsn.match(/^([^:]+):\/\//);
  if (!protocolMatch) {
    return dsn; // Not a recognizable DSN format
  }

  const protocol = protocolMatch[1];
  const protocolPart = dsn.substring(protocolMatch[0].length);

  // Passwords may contain @, so the last @ separates credentials from host
  const lastAtIndex = protocolPart.lastIndexOf('@');
  if (lastAtIndex === -1) {
    return dsn;
  }

  const credentialsPart = protocolPart.substring(0, lastAtIndex);
  const hostPart = protocolPart.substring(lastAtIndex + 1);

  const colonIndex = credentialsPart.indexOf(':');
  if (colonIndex === -1) {
    return dsn;
  }

  const username = credentialsPart.substring(0, colonIndex);
  const password = credentialsPart.substring(colonIndex + 1);
  const obfuscatedPassword = '*'.repeat(Math.min(password.length, 8));

  return `${protocol}://${username}:${obfuscatedPassword}@${hostPart}`;
}

/**
 * Keeps the last four characters of a bearer token so two tokens can be told apart in logs
 */
export function obfuscateToken(token: string): string {
  if (token.length <= 8) {
    return MASK;
  }
  return `${MASK}${token.slice(-4)}`;
}

/**
 * Tunnel settings safe to print. The identity file path is kept, its contents never read here.
 */
export function describeTunnelConfig(config: TunnelConfig): string {
  const identity = config.identityFile ? ` (key ${config.identityFile})` : '';
  return (
    `localhost:${config.localPort} -> ${config.remoteHost}:${config.remotePort} ` +
    `via ${config.user}@${config.host}:${config.port}${identity}`
  );
}
