/**
 * SSH Tunnel Configuration Types
 */

export interface SSHTunnelConfig {
  /** SSH server hostname or ~/.ssh/config alias */
  host: string;

  /** SSH server port (default: 22) */
  port?: number;

  /** SSH username */
  username?: string;

  /** Path to SSH private key file, passed to ssh as -i */
  privateKey?: string;
}

/**
 * Fully resolved tunnel parameters for one named server.
 */
export interface TunnelConfig {
  serverName: string;
  host: string;
  port: number;
  user: string;
  identityFile?: string;
  remoteHost: string;
  remotePort: number;
  localPort: number;
}

export interface TunnelStatus {
  tunnelActive: boolean;
  databaseResponding: boolean;
  localPort: number;
  /** "remote_host:remote_port" as seen from the SSH server */
  remoteTarget: string;
  /** "user@host:port" */
  sshEndpoint: string;
  /** PID of the ssh process this instance owns, if any */
  pid?: number;
}

export interface StopOptions {
  /**
   * Also kill ssh processes matching this tunnel's port forward when this
   * instance owns a child. Without an owned child the match always runs
   * unless ownedOnly is set.
   */
  includeExternal?: boolean;

  /** Never kill ssh processes this instance did not start */
  ownedOnly?: boolean;
}
