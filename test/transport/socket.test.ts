import { describe, it, expect, afterEach } from 'vitest';
import * as net from 'node:net';
import { connectSocket, createSocketTransportFactory } from '../../src/transport/socket.js';
import { ConnectionError } from '../../src/core/errors.js';
import type { Transport } from '../../src/types/index.js';

function listen(onConnection: (socket: net.Socket) => void): Promise<{ server: net.Server; port: number }> {
  return new Promise((resolve) => {
    const server = net.createServer(onConnection);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      resolve({ server, port: typeof address === 'object' && address !== null ? address.port : 0 });
    });
  });
}

function close(server: net.Server): Promise<void> {
  return new Promise((resolve) => server.close(() => resolve()));
}

describe('SocketTransport', () => {
  let server: net.Server | null = null;
  let transport: Transport | null = null;

  afterEach(async () => {
    transport?.close();
    transport = null;
    if (server) {
      await close(server);
      server = null;
    }
  });

  it('should split the stream into lines without terminators', async () => {
    const started = await listen((socket) => {
      socket.write('220 Hello\r\n230 Split');
      setTimeout(() => socket.end(' line\nlast without newline'), 10);
    });
    server = started.server;

    transport = await connectSocket('127.0.0.1', started.port);

    expect(await transport.readLine()).toBe('220 Hello');
    expect(await transport.readLine()).toBe('230 Split line');
    expect(await transport.readLine()).toBe('last without newline');
    expect(await transport.readLine()).toBeNull();
    expect(await transport.readLine()).toBeNull();
  });

  it('should write lines terminated by CRLF', async () => {
    let resolveReceived: (data: string) => void = () => {};
    const received = new Promise<string>((resolve) => {
      resolveReceived = resolve;
    });

    const started = await listen((socket) => {
      socket.setEncoding('utf8');
      let data = '';
      socket.on('data', (chunk: string) => {
        data += chunk;
        if (data.endsWith('\r\n')) {
          resolveReceived(data);
          socket.end();
        }
      });
    });
    server = started.server;

    transport = await createSocketTransportFactory()('127.0.0.1', started.port);
    await transport.writeLine('NOOP');

    expect(await received).toBe('NOOP\r\n');
  });

  it('should reject writes after close', async () => {
    const started = await listen(() => {});
    server = started.server;

    transport = await connectSocket('127.0.0.1', started.port);
    transport.close();

    expect(transport.closed).toBe(true);
    await expect(transport.writeLine('NOOP')).rejects.toThrow('Transport is closed');
    expect(await transport.readLine()).toBeNull();
  });

  it('should fail with ConnectionError when nothing listens', async () => {
    const started = await listen(() => {});
    const port = started.port;
    await close(started.server);

    const error = await connectSocket('127.0.0.1', port).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConnectionError);
    expect(error).toMatchObject({ host: '127.0.0.1', port, code: 'ECONNREFUSED' });
  });
});
