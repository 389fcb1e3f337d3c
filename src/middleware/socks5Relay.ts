/**
 * socks5Relay.ts — Minimal SOCKS5 relay (RFC 1928) with username/password auth (RFC 1929).
 *
 * The CAPTCHA service solves DataDome challenges from the IP the browser
 * used, so it connects back through this relay.  Every connection must
 * authenticate; the credential check is delegated to the owner (the proxy
 * credential manager), which accepts only live, unexpired leases.  Only the
 * CONNECT command is supported.
 */

import * as net from 'net';
import { Logger } from '../core/logger';

const logger = new Logger('Socks5Relay');

const SOCKS_VERSION = 0x05;
const AUTH_VERSION = 0x01;
const METHOD_USER_PASS = 0x02;
const METHOD_NONE_ACCEPTABLE = 0xff;
const CMD_CONNECT = 0x01;

const ATYP_IPV4 = 0x01;
const ATYP_DOMAIN = 0x03;
const ATYP_IPV6 = 0x04;

export const REPLY = {
  succeeded: 0x00,
  generalFailure: 0x01,
  hostUnreachable: 0x04,
  connectionRefused: 0x05,
  commandNotSupported: 0x07,
  addressTypeNotSupported: 0x08,
} as const;

/** Returns the lease id the pair belongs to, or null to reject. */
export type CredentialCheck = (username: string, password: string) => string | null;

export interface Socks5RelayOptions {
  host: string;
  port: number;
  authenticate: CredentialCheck;
  /** Whole greeting/auth/request exchange must finish within this. */
  handshakeTimeoutMs?: number;
}

// ── Buffered reads over a socket ───────────────────────────

class SocketReader {
  private buffered = Buffer.alloc(0);
  private waiter: { size: number; resolve: (chunk: Buffer) => void; reject: (err: Error) => void } | null =
    null;
  private failure: Error | null = null;

  private readonly onData = (chunk: Buffer): void => {
    this.buffered = Buffer.concat([this.buffered, chunk]);
    this.drain();
  };
  private readonly onEnd = (): void => this.fail(new Error('client closed the connection'));
  private readonly onError = (err: Error): void => this.fail(err);

  constructor(private readonly socket: net.Socket) {
    socket.on('data', this.onData);
    socket.on('end', this.onEnd);
    socket.on('close', this.onEnd);
    socket.on('error', this.onError);
  }

  read(size: number): Promise<Buffer> {
    return new Promise((resolve, reject) => {
      this.waiter = { size, resolve, reject };
      this.drain();
    });
  }

  async readByte(): Promise<number> {
    const [value] = await this.read(1);
    return value;
  }

  /** Stop buffering and hand back anything read past the handshake. */
  detach(): Buffer {
    this.socket.pause();
    this.socket.off('data', this.onData);
    this.socket.off('end', this.onEnd);
    this.socket.off('close', this.onEnd);
    this.socket.off('error', this.onError);
    return this.buffered;
  }

  private drain(): void {
    const waiter = this.waiter;
    if (!waiter) return;

    if (this.buffered.length >= waiter.size) {
      const chunk = this.buffered.subarray(0, waiter.size);
      this.buffered = this.buffered.subarray(waiter.size);
      this.waiter = null;
      waiter.resolve(chunk);
    } else if (this.failure) {
      this.waiter = null;
      waiter.reject(this.failure);
    }
  }

  private fail(err: Error): void {
    this.failure ??= err;
    this.drain();
  }
}

class HandshakeRejected extends Error {}

// ── Relay ──────────────────────────────────────────────────

export class Socks5Relay {
  private readonly server: net.Server;
  private readonly sockets = new Set<net.Socket>();
  private boundPort: number | null = null;

  constructor(private readonly options: Socks5RelayOptions) {
    this.server = net.createServer((socket) => this.handle(socket));
  }

  get listening(): boolean {
    return this.server.listening;
  }

  /** Port actually bound, or null when not listening. */
  address(): number | null {
    return this.boundPort;
  }

  /** Bind the listener. Rejects with the socket error (e.g. EADDRINUSE). */
  listen(): Promise<number> {
    return new Promise((resolve, reject) => {
      const onError = (err: Error): void => reject(err);
      this.server.once('error', onError);
      this.server.listen(this.options.port, this.options.host, () => {
        this.server.off('error', onError);
        this.server.on('error', (err) => logger.error('Relay listener error', err));

        const address = this.server.address();
        this.boundPort = typeof address === 'object' && address ? address.port : this.options.port;
        logger.info(`SOCKS5 relay listening on ${this.options.host}:${this.boundPort}`);
        resolve(this.boundPort);
      });
    });
  }

  /** Stop accepting and drop every open connection. */
  async close(): Promise<void> {
    for (const socket of this.sockets) socket.destroy();
    this.sockets.clear();

    if (!this.server.listening) return;
    await new Promise<void>((resolve, reject) => {
      this.server.close((err) => (err ? reject(err) : resolve()));
    });
    this.boundPort = null;
    logger.info('SOCKS5 relay stopped');
  }

  // ── Per-connection handling ────────────────────────────

  private handle(client: net.Socket): void {
    this.track(client);
    client.setTimeout(this.options.handshakeTimeoutMs ?? 30_000);
    client.once('timeout', () => client.destroy());

    this.negotiate(client).catch((err: unknown) => {
      if (err instanceof HandshakeRejected) {
        // A rejection reply was sent with end(); let it flush.
        if (!client.writableEnded) client.destroy();
        return;
      }
      logger.debug(`SOCKS5 handshake aborted: ${err instanceof Error ? err.message : String(err)}`);
      client.destroy();
    });
  }

  private async negotiate(client: net.Socket): Promise<void> {
    const reader = new SocketReader(client);

    // Greeting: VER NMETHODS METHODS…
    const [version, methodCount] = await reader.read(2);
    if (version !== SOCKS_VERSION) throw new HandshakeRejected();
    const methods = await reader.read(methodCount);
    if (!methods.includes(METHOD_USER_PASS)) {
      client.end(Buffer.from([SOCKS_VERSION, METHOD_NONE_ACCEPTABLE]));
      throw new HandshakeRejected();
    }
    client.write(Buffer.from([SOCKS_VERSION, METHOD_USER_PASS]));

    // RFC 1929: VER ULEN UNAME PLEN PASSWD
    const [authVersion, userLength] = await reader.read(2);
    if (authVersion !== AUTH_VERSION) throw new HandshakeRejected();
    const username = (await reader.read(userLength)).toString('utf8');
    const password = (await reader.read(await reader.readByte())).toString('utf8');

    const leaseId = this.options.authenticate(username, password);
    if (!leaseId) {
      logger.warn('Rejected SOCKS5 connection with unknown or expired credentials');
      client.end(Buffer.from([AUTH_VERSION, 0x01]));
      throw new HandshakeRejected();
    }
    client.write(Buffer.from([AUTH_VERSION, 0x00]));

    // Request: VER CMD RSV ATYP DST.ADDR DST.PORT
    const [, command, , addressType] = await reader.read(4);
    if (command !== CMD_CONNECT) {
      this.reply(client, REPLY.commandNotSupported, true);
      throw new HandshakeRejected();
    }

    const host = await this.readAddress(reader, addressType);
    if (host === null) {
      this.reply(client, REPLY.addressTypeNotSupported, true);
      throw new HandshakeRejected();
    }
    const port = (await reader.read(2)).readUInt16BE(0);

    logger.debug(`Lease ${leaseId} connecting to ${host}:${port}`);
    const target = await this.connectTarget(host, port).catch((err: unknown) => {
      const code = err instanceof Error && 'code' in err ? String(err.code) : '';
      this.reply(client, code === 'ECONNREFUSED' ? REPLY.connectionRefused : REPLY.hostUnreachable, true);
      throw new HandshakeRejected();
    });
    this.track(target);

    client.setTimeout(0);
    this.reply(client, REPLY.succeeded, false);
    this.pipe(client, target, reader.detach());
  }

  private async readAddress(reader: SocketReader, addressType: number): Promise<string | null> {
    switch (addressType) {
      case ATYP_IPV4:
        return [...(await reader.read(4))].join('.');
      case ATYP_DOMAIN: {
        const length = await reader.readByte();
        return (await reader.read(length)).toString('utf8');
      }
      case ATYP_IPV6: {
        const raw = await reader.read(16);
        const groups: string[] = [];
        for (let i = 0; i < 16; i += 2) groups.push(raw.readUInt16BE(i).toString(16));
        return groups.join(':');
      }
      default:
        return null;
    }
  }

  private connectTarget(host: string, port: number): Promise<net.Socket> {
    return new Promise((resolve, reject) => {
      const target = net.connect({ host, port });
      target.once('connect', () => {
        target.off('error', reject);
        resolve(target);
      });
      target.once('error', reject);
    });
  }

  private pipe(client: net.Socket, target: net.Socket, leftover: Buffer): void {
    const teardown = (): void => {
      client.destroy();
      target.destroy();
    };
    client.on('error', teardown);
    target.on('error', teardown);
    client.on('close', teardown);
    target.on('close', teardown);

    if (leftover.length > 0) target.write(leftover);
    client.pipe(target);
    target.pipe(client);
  }

  private reply(client: net.Socket, status: number, close: boolean): void {
    // BND.ADDR/BND.PORT are not meaningful to the callers; report 0.0.0.0:0.
    const message = Buffer.from([SOCKS_VERSION, status, 0x00, ATYP_IPV4, 0, 0, 0, 0, 0, 0]);
    if (close) client.end(message);
    else client.write(message);
  }

  private track(socket: net.Socket): void {
    this.sockets.add(socket);
    socket.once('close', () => this.sockets.delete(socket));
  }
}
