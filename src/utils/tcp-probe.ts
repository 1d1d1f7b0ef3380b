import { Socket, createConnection } from 'net';

/**
 * Outcome of a raw TCP probe. Callers that only need liveness collapse this
 * with isOpen(); the other variants are kept for diagnostics.
 */
export type ProbeResult =
  | { kind: 'open'; data: Buffer }
  | { kind: 'closed' }
  | { kind: 'error'; reason: string };

export interface ProbeOptions {
  host?: string;
  timeoutMs: number;
}

export interface GreetingOptions extends ProbeOptions {
  /** Stop reading after this many bytes (default: 100) */
  maxBytes?: number;
}

const LOOPBACK = '127.0.0.1';

/** Substrings a MariaDB/MySQL server handshake carries in its version string */
const DATABASE_SIGNATURES = ['mariadb', 'mysql'];

export function isOpen(result: ProbeResult): boolean {
  return result.kind === 'open';
}

/**
 * Open a TCP connection and report whether anything accepted it.
 * Never rejects.
 */
export function probePort(port: number, options: ProbeOptions): Promise<ProbeResult> {
  return connectAndRead(port, options, 0);
}

/**
 * Connect and read the first chunk the server sends unprompted.
 * Never rejects.
 */
export function readGreeting(port: number, options: GreetingOptions): Promise<ProbeResult> {
  return connectAndRead(port, options, options.maxBytes ?? 100);
}

/**
 * Case-insensitive check for a database handshake signature
 */
export function looksLikeDatabaseGreeting(data: Buffer): boolean {
  const text = data.toString('latin1').toLowerCase();
  return DATABASE_SIGNATURES.some((signature) => text.includes(signature));
}

function connectAndRead(port: number, options: ProbeOptions, maxBytes: number): Promise<ProbeResult> {
  return new Promise((resolve) => {
    let socket: Socket | null = null;
    let settled = false;
    const chunks: Buffer[] = [];

    const finish = (result: ProbeResult): void => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      socket?.destroy();
      resolve(result);
    };

    const collected = (): Buffer => Buffer.concat(chunks).subarray(0, maxBytes);

    const timer = setTimeout(() => {
      finish({ kind: 'error', reason: `timed out after ${options.timeoutMs}ms` });
    }, options.timeoutMs);

    const opened = openSocket(options.host ?? LOOPBACK, port);
    if (typeof opened === 'string') {
      finish({ kind: 'error', reason: opened });
      return;
    }
    socket = opened;

    socket.once('connect', () => {
      if (maxBytes === 0) {
        finish({ kind: 'open', data: Buffer.alloc(0) });
      }
    });

    // Like a single recv(): the first chunk is the greeting, capped at maxBytes
    socket.once('data', (chunk: Buffer) => {
      chunks.push(chunk);
      finish({ kind: 'open', data: collected() });
    });

    // Server closed the connection without sending anything
    socket.once('end', () => {
      finish({ kind: 'open', data: collected() });
    });

    socket.on('error', (err: NodeJS.ErrnoException) => {
      if (err.code === 'ECONNREFUSED') {
        finish({ kind: 'closed' });
      } else {
        finish({ kind: 'error', reason: err.message });
      }
    });
  });
}

/**
 * createConnection throws synchronously on an invalid port; report that as a string
 */
function openSocket(host: string, port: number): Socket | string {
  try {
    return createConnection({ host, port });
  } catch (error) {
    return error instanceof Error ? error.message : String(error);
  }
}
