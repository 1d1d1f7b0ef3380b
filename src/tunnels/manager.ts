import type { CredentialStore } from '../config/secrets.js';
import type { ServerConfigResolver } from '../config/server-config.js';
import type { TunnelStatus } from '../types/ssh.js';
import { SSHTunnel } from '../utils/ssh-tunnel.js';
import type { SSHTunnelDependencies } from '../utils/ssh-tunnel.js';

export interface TunnelManagerOptions {
  /** Registry storage; pass a shared map to share tunnels between managers */
  tunnels?: Map<string, SSHTunnel>;
  /** Handed to every SSHTunnel this manager creates */
  dependencies?: SSHTunnelDependencies;
}

/**
 * Registry of SSH tunnels, one per server name. Tunnels are created on first
 * use and kept until the manager is discarded.
 */
export class TunnelManager {
  private readonly resolver: ServerConfigResolver;
  private readonly credentials: CredentialStore;
  private readonly tunnels: Map<string, SSHTunnel>;
  private readonly dependencies: SSHTunnelDependencies;

  constructor(
    resolver: ServerConfigResolver,
    credentials: CredentialStore,
    options: TunnelManagerOptions = {}
  ) {
    this.resolver = resolver;
    this.credentials = credentials;
    this.tunnels = options.tunnels ?? new Map();
    this.dependencies = options.dependencies ?? {};
  }

  /**
   * Get or create the tunnel for a server (default server when omitted)
   */
  get(serverName?: string): SSHTunnel {
    const name = serverName ?? this.resolver.defaultServerName();
    let tunnel = this.tunnels.get(name);
    if (!tunnel) {
      tunnel = new SSHTunnel(this.credentials.tunnelConfig(name), this.dependencies);
      this.tunnels.set(name, tunnel);
    }
    return tunnel;
  }

  ensure(serverName?: string): Promise<boolean> {
    return this.get(serverName).ensureConnected();
  }

  status(serverName?: string): Promise<TunnelStatus> {
    return this.get(serverName).status();
  }

  /**
   * Stop every ssh process started through this registry. Resolves to the
   * names of tunnels whose local port is still open afterwards.
   */
  async stopAll(): Promise<string[]> {
    const stillOpen: string[] = [];
    for (const [name, tunnel] of this.tunnels) {
      if (tunnel.getPid() === undefined) {
        continue;
      }
      if (!(await tunnel.stop({ ownedOnly: true }))) {
        stillOpen.push(name);
      }
    }
    return stillOpen;
  }

  get size(): number {
    return this.tunnels.size;
  }
}
