import { execFile, spawn } from 'child_process';
import type { Readable } from 'stream';
import type { StopOptions, TunnelConfig, TunnelStatus } from '../types/ssh.js';
import { ProcessError, errorMessage } from './errors.js';
import { isOpen, looksLikeDatabaseGreeting, probePort, readGreeting } from './tcp-probe.js';

/** Liveness probe timeout */
export const ACTIVE_PROBE_TIMEOUT_MS = 2000;
/** Greeting read timeout */
export const GREETING_PROBE_TIMEOUT_MS = 5000;
/** How long ssh may take to launch before it is killed */
export const LAUNCH_TIMEOUT_MS = 10_000;
export const POLL_INTERVAL_MS = 500;
export const STOP_SETTLE_MS = 500;

const STDERR_TAIL_BYTES = 2000;

/**
 * The parts of a child process the tunnel relies on
 */
export interface TunnelProcess {
  readonly pid?: number | undefined;
  readonly stderr: Readable | null;
  kill(signal?: NodeJS.Signals): boolean;
  once(event: 'spawn' | 'error' | 'exit', listener: (...args: unknown[]) => void): unknown;
}

export type SpawnFunction = (command: string, args: string[]) => TunnelProcess;

export interface SSHTunnelDependencies {
  /** Launches the ssh client; defaults to child_process.spawn */
  spawn?: SpawnFunction;
  /** Kills processes whose command line matches the pattern; defaults to pkill -f */
  killMatching?: (pattern: string) => Promise<void>;
  sleep?: (ms: number) => Promise<void>;
  /** ssh executable (default: "ssh") */
  sshBinary?: string;
}

interface ExitInfo {
  code: number | null;
  signal: string | null;
  stderr: string;
}

const defaultSpawn: SpawnFunction = (command, args) =>
  spawn(command, args, { stdio: ['ignore', 'ignore', 'pipe'] });

const defaultSleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * pkill exits 1 when nothing matched, which is not a failure here
 */
function pkillMatching(pattern: string): Promise<void> {
  return new Promise((resolve, reject) => {
    execFile('pkill', ['-f', pattern], (error) => {
      if (error && error.code !== 1) {
        reject(error);
        return;
      }
      resolve();
    });
  });
}

/**
 * SSH local port forward for one server, run through the system ssh client.
 *
 * The tunnel counts as active when something accepts connections on
 * 127.0.0.1:localPort, whoever started it. The ssh process launched by
 * start() is owned by this instance and is what stop() terminates.
 */
export class SSHTunnel {
  private readonly config: TunnelConfig;
  private readonly spawnProcess: SpawnFunction;
  private readonly killMatching: (pattern: string) => Promise<void>;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly sshBinary: string;
  private process: TunnelProcess | null = null;
  private lastExit: ExitInfo | null = null;
  private exited: Promise<void> = Promise.resolve();

  constructor(config: TunnelConfig, dependencies: SSHTunnelDependencies = {}) {
    this.config = config;
    this.spawnProcess = dependencies.spawn ?? defaultSpawn;
    this.killMatching = dependencies.killMatching ?? pkillMatching;
    this.sleep = dependencies.sleep ?? defaultSleep;
    this.sshBinary = dependencies.sshBinary ?? 'ssh';
  }

  getConfig(): TunnelConfig {
    return this.config;
  }

  /**
   * PID of the ssh process this instance started, while it is running
   */
  getPid(): number | undefined {
    return this.process?.pid;
  }

  /**
   * Resolves once the ssh process started by this instance has exited
   * (immediately when there is none)
   */
  waitForExit(): Promise<void> {
    return this.process ? this.exited : Promise.resolve();
  }

  /**
   * Arguments for the ssh client: forward only, no remote command
   */
  buildSshArgs(): string[] {
    const { localPort, remoteHost, remotePort, port, user, host, identityFile } = this.config;
    const args = ['-N', '-L', `${localPort}:${remoteHost}:${remotePort}`, '-p', String(port)];
    if (identityFile) {
      args.push('-i', identityFile);
    }
    args.push(
      '-o', 'StrictHostKeyChecking=no',
      '-o', 'ExitOnForwardFailure=yes',
      `${user}@${host}`
    );
    return args;
  }

  async isTunnelActive(): Promise<boolean> {
    const result = await probePort(this.config.localPort, { timeoutMs: ACTIVE_PROBE_TIMEOUT_MS });
    return isOpen(result);
  }

  /**
   * Check that a MariaDB/MySQL server answers through the tunnel with its handshake
   */
  async isDatabaseResponding(): Promise<boolean> {
    const result = await readGreeting(this.config.localPort, {
      timeoutMs: GREETING_PROBE_TIMEOUT_MS,
      maxBytes: 100,
    });
    return result.kind === 'open' && looksLikeDatabaseGreeting(result.data);
  }

  /**
   * Start the tunnel and wait for the local port to open.
   * Resolves false instead of throwing when ssh cannot be launched or exits.
   */
  async start(waitSeconds: number = 3): Promise<boolean> {
    if (await this.isTunnelActive()) {
      return true;
    }

    try {
      await this.launch();
    } catch (error) {
      console.error(`[tunnel:${this.config.serverName}] Failed to start tunnel: ${errorMessage(error)}`);
      return false;
    }

    for (let attempt = 0; attempt < waitSeconds * 2; attempt++) {
      await this.sleep(POLL_INTERVAL_MS);
      if (!this.process && this.lastExit) {
        const { code, signal, stderr } = this.lastExit;
        console.error(
          `[tunnel:${this.config.serverName}] ssh exited (${signal ?? `code ${code}`})` +
            (stderr ? `: ${stderr.trim()}` : '')
        );
        return false;
      }
      if (await this.isTunnelActive()) {
        console.error(
          `[tunnel:${this.config.serverName}] SSH tunnel established: localhost:${this.config.localPort} -> ` +
            `${this.config.remoteHost}:${this.config.remotePort}`
        );
        return true;
      }
    }

    if (await this.isTunnelActive()) {
      return true;
    }
    // no owned ssh survives a failed start
    if (this.releaseOwned()) {
      console.error(
        `[tunnel:${this.config.serverName}] Port ${this.config.localPort} did not open within ${waitSeconds}s; stopped ssh`
      );
    }
    return false;
  }

  /**
   * Terminate the ssh process this instance started. When this instance owns
   * none (e.g. a fresh CLI process), fall back to killing any ssh process
   * forwarding the same local port to the same remote host. includeExternal
   * runs that match even when a child was owned; ownedOnly never runs it.
   */
  async stop(options: StopOptions = {}): Promise<boolean> {
    try {
      const owned = this.releaseOwned();
      if (options.includeExternal || (!owned && !options.ownedOnly)) {
        await this.killMatching(`ssh.*${this.config.localPort}:${this.config.remoteHost}`);
      } else if (!owned) {
        console.error(`[tunnel:${this.config.serverName}] No ssh process owned by this instance`);
      }
      await this.sleep(STOP_SETTLE_MS);
      return !(await this.isTunnelActive());
    } catch (error) {
      console.error(`[tunnel:${this.config.serverName}] Failed to stop tunnel: ${errorMessage(error)}`);
      return false;
    }
  }

  async ensureConnected(): Promise<boolean> {
    if (await this.isTunnelActive()) {
      return true;
    }
    return this.start();
  }

  async status(): Promise<TunnelStatus> {
    const tunnelActive = await this.isTunnelActive();
    // A greeting probe against a closed port says nothing useful
    const databaseResponding = tunnelActive ? await this.isDatabaseResponding() : false;

    const status: TunnelStatus = {
      tunnelActive,
      databaseResponding,
      localPort: this.config.localPort,
      remoteTarget: `${this.config.remoteHost}:${this.config.remotePort}`,
      sshEndpoint: `${this.config.user}@${this.config.host}:${this.config.port}`,
    };
    const pid = this.getPid();
    if (pid !== undefined) {
      status.pid = pid;
    }
    return status;
  }

  /**
   * SIGTERM the owned child and forget it. Returns whether there was one.
   */
  private releaseOwned(): boolean {
    const child = this.process;
    if (!child) {
      return false;
    }
    child.kill('SIGTERM');
    this.process = null;
    return true;
  }

  /**
   * Spawn ssh and wait for the OS to confirm the launch. An owned child that
   * is still running is stopped first, so at most one is ever tracked.
   */
  private launch(): Promise<TunnelProcess> {
    this.releaseOwned();
    const args = this.buildSshArgs();

    return new Promise((resolve, reject) => {
      let child: TunnelProcess;
      try {
        child = this.spawnProcess(this.sshBinary, args);
      } catch (error) {
        reject(new ProcessError(`Failed to launch ${this.sshBinary}: ${errorMessage(error)}`));
        return;
      }

      let launched = false;
      let stderr = '';
      this.exited = new Promise((resolveExit) => {
        child.once('exit', () => resolveExit());
      });
      child.stderr?.on('data', (chunk: Buffer) => {
        stderr = (stderr + chunk.toString()).slice(-STDERR_TAIL_BYTES);
      });

      const timer = setTimeout(() => {
        child.kill('SIGTERM');
        reject(new ProcessError(`Timeout starting SSH tunnel after ${LAUNCH_TIMEOUT_MS / 1000}s`));
      }, LAUNCH_TIMEOUT_MS);

      child.once('spawn', () => {
        clearTimeout(timer);
        launched = true;
        this.process = child;
        this.lastExit = null;
        resolve(child);
      });

      child.once('error', (err: unknown) => {
        clearTimeout(timer);
        if (!launched) {
          reject(new ProcessError(`Failed to launch ${this.sshBinary}: ${errorMessage(err)}`));
        }
      });

      child.once('exit', (code: unknown, signal: unknown) => {
        clearTimeout(timer);
        const exit: ExitInfo = {
          code: typeof code === 'number' ? code : null,
          signal: typeof signal === 'string' ? signal : null,
          stderr,
        };
        if (this.process === child) {
          this.process = null;
          this.lastExit = exit;
        }
        if (!launched) {
          reject(new ProcessError(`ssh exited before launching (code ${exit.code})`, exit.code, stderr));
        }
      });
    });
  }
}
