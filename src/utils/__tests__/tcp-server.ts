import { createServer } from 'net';
import type { Server, Socket } from 'net';

/**
 * Start a loopback server on an ephemeral port. Connections are ended
 * immediately unless a handler is given.
 */
export async function listen(onConnection: (socket: Socket) => void = (socket) => socket.end()): Promise<Server> {
  const server = createServer((socket) => {
    // probes hang up abruptly; a reset here is expected
    socket.on('error', () => {});
    onConnection(socket);
  });
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  return server;
}

export function portOf(server: Server): number {
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('server is not listening on a TCP port');
  }
  return address.port;
}

export function close(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

/**
 * A port that was just released, so nothing is listening on it
 */
export async function closedPort(): Promise<number> {
  const server = await listen();
  const port = portOf(server);
  await close(server);
  return port;
}

/** Start of a MariaDB initial handshake packet */
export const MARIADB_GREETING = Buffer.concat([
  Buffer.from([0x5b, 0x00, 0x00, 0x00, 0x0a]),
  Buffer.from('5.5.5-10.11.6-MariaDB-log\0', 'latin1'),
  Buffer.alloc(40, 0x2e),
]);
