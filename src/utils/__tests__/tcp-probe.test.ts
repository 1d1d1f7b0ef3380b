import { describe, it, expect, afterEach } from 'vitest';
import type { Server, Socket } from 'net';
import { isOpen, looksLikeDatabaseGreeting, probePort, readGreeting } from '../tcp-probe.js';
import { MARIADB_GREETING, close, closedPort, listen, portOf } from './tcp-server.js';

describe('TCP probes', () => {
  let server: Server | null = null;
  const held: Socket[] = [];

  afterEach(async () => {
    held.splice(0).forEach((socket) => socket.destroy());
    if (server) {
      await close(server);
      server = null;
    }
  });

  describe('probePort', () => {
    it('should report open when something accepts the connection', async () => {
      server = await listen();

      const result = await probePort(portOf(server), { timeoutMs: 2000 });

      expect(result).toEqual({ kind: 'open', data: Buffer.alloc(0) });
      expect(isOpen(result)).toBe(true);
    });

    it('should report closed when nothing listens', async () => {
      const port = await closedPort();

      const result = await probePort(port, { timeoutMs: 2000 });

      expect(result).toEqual({ kind: 'closed' });
      expect(isOpen(result)).toBe(false);
    });

    it('should report an invalid port as an error instead of throwing', async () => {
      const result = await probePort(70000, { timeoutMs: 2000 });

      expect(result.kind).toBe('error');
    });
  });

  describe('readGreeting', () => {
    it('should return the first bytes the server sends', async () => {
      server = await listen((socket) => socket.end(MARIADB_GREETING));

      const result = await readGreeting(portOf(server), { timeoutMs: 2000 });

      expect(result).toEqual({ kind: 'open', data: MARIADB_GREETING });
    });

    it('should cap the data at maxBytes', async () => {
      server = await listen((socket) => socket.end(Buffer.alloc(300, 0x61)));

      const result = await readGreeting(portOf(server), { timeoutMs: 2000, maxBytes: 100 });

      expect(result.kind).toBe('open');
      expect(result.kind === 'open' && result.data.length).toBe(100);
    });

    it('should return empty data when the server closes without sending', async () => {
      server = await listen();

      const result = await readGreeting(portOf(server), { timeoutMs: 2000 });

      expect(result).toEqual({ kind: 'open', data: Buffer.alloc(0) });
    });

    it('should time out when the server stays silent', async () => {
      server = await listen((socket) => {
        held.push(socket);
      });

      const result = await readGreeting(portOf(server), { timeoutMs: 100 });

      expect(result).toEqual({ kind: 'error', reason: 'timed out after 100ms' });
    });

    it('should report closed when nothing listens', async () => {
      const port = await closedPort();

      expect(await readGreeting(port, { timeoutMs: 2000 })).toEqual({ kind: 'closed' });
    });
  });

  describe('looksLikeDatabaseGreeting', () => {
    it('should recognise a MariaDB handshake', () => {
      expect(looksLikeDatabaseGreeting(MARIADB_GREETING)).toBe(true);
    });

    it('should match mysql in any case', () => {
      expect(looksLikeDatabaseGreeting(Buffer.from('8.0.36-MySQL Community Server'))).toBe(true);
    });

    it('should reject other protocols', () => {
      expect(looksLikeDatabaseGreeting(Buffer.from('SSH-2.0-OpenSSH_9.6\r\n'))).toBe(false);
      expect(looksLikeDatabaseGreeting(Buffer.alloc(0))).toBe(false);
    });
  });
});
