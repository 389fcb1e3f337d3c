/**
 * proxyCredentialManager.ts — On-demand SOCKS5 relay with single-use, TTL-bound credentials.
 *
 * The relay runs only while a lease is live.  `acquireLease()` starts it (or
 * reuses the running listener), mints a random username/password pair and
 * arms a TTL timer; `release()` or the timer invalidates the pair at once
 * and stops the listener when nothing else holds it.
 *
 * The relay port is one process-wide resource, so at most one lease is
 * live at a time: later callers wait in FIFO order until the slot frees up
 * or `acquireTimeoutMs` passes, then fail with `ProxyUnavailableError`.
 *
 * Only lease ids are logged.  The credentials themselves never are.
 */

import { randomBytes, randomUUID, timingSafeEqual } from 'crypto';
import { ProxyUnavailableError } from '../core/errors';
import { Logger } from '../core/logger';
import { systemClock, type Clock, type ProxyEndpoint, type ProxyLease } from '../core/types';
import { Socks5Relay } from '../middleware/socks5Relay';

const logger = new Logger('ProxyCredentialManager');

export interface ProxyCredentialManagerOptions {
  bindHost: string;
  /** 0 binds an ephemeral port (tests). */
  port: number;
  /** Host the CAPTCHA service should dial; defaults to bindHost. */
  publicHost?: string;
  leaseTtlMs: number;
  acquireTimeoutMs: number;
  clock?: Clock;
}

interface LiveLease {
  lease: ProxyLease;
  timer: NodeJS.Timeout;
}

/** An acquire between claiming the slot and minting its lease. */
interface PendingAcquire {
  attemptId: string;
  cancelled: boolean;
}

interface Waiter {
  attemptId: string;
  resolve: () => void;
  reject: (err: Error) => void;
  timer: NodeJS.Timeout;
}

export class ProxyCredentialManager {
  private readonly clock: Clock;
  private readonly leases = new Map<string, LiveLease>();
  private readonly waiters: Waiter[] = [];
  private readonly pending = new Set<PendingAcquire>();
  private slotHeld = false;
  private relay: Socks5Relay | null = null;
  private stopping: Promise<void> | null = null;

  constructor(private readonly options: ProxyCredentialManagerOptions) {
    this.clock = options.clock ?? systemClock;
  }

  // ── Leases ─────────────────────────────────────────────

  /**
   * Mint a lease for `attemptId`, starting the relay if needed.
   *
   * @throws ProxyUnavailableError when the relay cannot bind or no slot
   *   frees up within the acquire timeout.
   */
  async acquireLease(attemptId: string): Promise<ProxyLease> {
    const pending: PendingAcquire = { attemptId, cancelled: false };
    this.pending.add(pending);

    try {
      await this.claimSlot(attemptId);

      let relay: Socks5Relay;
      try {
        relay = await this.ensureRelay();
        if (pending.cancelled) {
          throw new ProxyUnavailableError(`Attempt ${attemptId} finished before a proxy lease was issued`);
        }
      } catch (err) {
        await this.freeSlot();
        throw err;
      }
      return this.issue(attemptId, relay);
    } finally {
      this.pending.delete(pending);
    }
  }

  private issue(attemptId: string, relay: Socks5Relay): ProxyLease {
    const now = this.clock();
    const lease: ProxyLease = Object.freeze({
      id: randomUUID(),
      attemptId,
      username: `lease_${randomBytes(6).toString('hex')}`,
      password: randomBytes(18).toString('base64url'),
      port: relay.address() ?? this.options.port,
      createdAt: now,
      ttlMs: this.options.leaseTtlMs,
      expiresAt: new Date(now.getTime() + this.options.leaseTtlMs),
    });

    const timer = setTimeout(() => {
      this.expire(lease.id).catch((err: unknown) => logger.error(`Could not expire lease ${lease.id}`, err));
    }, this.options.leaseTtlMs);
    timer.unref();

    this.leases.set(lease.id, { lease, timer });
    logger.info(`Issued lease ${lease.id}`, { ttlSeconds: Math.round(lease.ttlMs / 1000) });
    return lease;
  }

  /** Invalidate the lease now. Releasing twice is a no-op. */
  async release(lease: ProxyLease): Promise<void> {
    const live = this.leases.get(lease.id);
    if (!live) return;

    clearTimeout(live.timer);
    this.leases.delete(lease.id);
    logger.info(`Released lease ${lease.id}`);
    await this.freeSlot();
  }

  /**
   * Release every lease and cancel every pending acquire belonging to an
   * attempt, including one still waiting for the relay to bind.
   */
  async releaseAll(attemptId: string): Promise<void> {
    for (const pending of this.pending) {
      if (pending.attemptId === attemptId) pending.cancelled = true;
    }
    for (const waiter of [...this.waiters]) {
      if (waiter.attemptId !== attemptId) continue;
      this.dropWaiter(waiter);
      waiter.reject(new ProxyUnavailableError(`Attempt ${attemptId} finished before a proxy lease was issued`));
    }

    const owned = [...this.leases.values()].filter(({ lease }) => lease.attemptId === attemptId);
    for (const { lease } of owned) {
      await this.release(lease);
    }
  }

  /** Run `fn` with a fresh lease; the lease is released on every exit path. */
  async withLease<T>(attemptId: string, fn: (lease: ProxyLease, endpoint: ProxyEndpoint) => Promise<T>): Promise<T> {
    const lease = await this.acquireLease(attemptId);
    try {
      return await fn(lease, this.endpointFor(lease));
    } finally {
      await this.release(lease);
    }
  }

  /** Address and credentials handed to the CAPTCHA service. */
  endpointFor(lease: ProxyLease): ProxyEndpoint {
    return {
      host: this.options.publicHost ?? this.options.bindHost,
      port: lease.port,
      username: lease.username,
      password: lease.password,
    };
  }

  /**
   * Relay-side credential check.  Returns the lease id for a live,
   * unexpired pair; released or expired pairs are rejected.
   */
  verify(username: string, password: string): string | null {
    const now = this.clock().getTime();
    for (const { lease } of this.leases.values()) {
      if (lease.username !== username) continue;
      if (!sameSecret(lease.password, password)) return null;
      return now < lease.expiresAt.getTime() ? lease.id : null;
    }
    return null;
  }

  activeLeaseCount(): number {
    return this.leases.size;
  }

  isRelayRunning(): boolean {
    return this.relay?.listening ?? false;
  }

  /** Cancel waiters, drop leases, stop the relay. */
  async shutdown(): Promise<void> {
    for (const pending of this.pending) pending.cancelled = true;
    for (const waiter of [...this.waiters]) {
      this.dropWaiter(waiter);
      waiter.reject(new ProxyUnavailableError('Proxy credential manager is shutting down'));
    }
    for (const { timer } of this.leases.values()) clearTimeout(timer);
    this.leases.clear();
    this.slotHeld = false;
    await this.stopRelay();
  }

  // ── Slot (one live lease per relay port) ───────────────

  private claimSlot(attemptId: string): Promise<void> {
    if (!this.slotHeld) {
      this.slotHeld = true;
      return Promise.resolve();
    }

    logger.debug(`Attempt ${attemptId} waiting for the proxy slot`);
    return new Promise((resolve, reject) => {
      const waiter: Waiter = {
        attemptId,
        resolve,
        reject,
        timer: setTimeout(() => {
          this.dropWaiter(waiter);
          reject(
            new ProxyUnavailableError(
              `No proxy lease freed up within ${Math.round(this.options.acquireTimeoutMs / 1000)}s`,
            ),
          );
        }, this.options.acquireTimeoutMs),
      };
      this.waiters.push(waiter);
    });
  }

  private dropWaiter(waiter: Waiter): void {
    clearTimeout(waiter.timer);
    const index = this.waiters.indexOf(waiter);
    if (index >= 0) this.waiters.splice(index, 1);
  }

  /** Hand the slot to the next waiter, or stop the relay when nobody wants it. */
  private async freeSlot(): Promise<void> {
    const next = this.waiters.shift();
    if (next) {
      clearTimeout(next.timer);
      next.resolve();
      return;
    }
    this.slotHeld = false;
    if (this.leases.size === 0) await this.stopRelay();
  }

  private async expire(leaseId: string): Promise<void> {
    const live = this.leases.get(leaseId);
    if (!live) return;
    this.leases.delete(leaseId);
    logger.warn(`Lease ${leaseId} expired before release`);
    await this.freeSlot();
  }

  // ── Relay lifecycle ────────────────────────────────────

  private async ensureRelay(): Promise<Socks5Relay> {
    if (this.stopping) await this.stopping;
    if (this.relay?.listening) return this.relay;

    const relay = new Socks5Relay({
      host: this.options.bindHost,
      port: this.options.port,
      authenticate: (username, password) => this.verify(username, password),
    });

    try {
      await relay.listen();
    } catch (err) {
      throw new ProxyUnavailableError(
        `SOCKS5 relay could not bind ${this.options.bindHost}:${this.options.port}`,
        { cause: err },
      );
    }
    this.relay = relay;
    return relay;
  }

  private async stopRelay(): Promise<void> {
    const relay = this.relay;
    this.relay = null;
    if (!relay) return;

    this.stopping = relay.close().finally(() => {
      this.stopping = null;
    });
    await this.stopping;
  }
}

function sameSecret(expected: string, given: string): boolean {
  const a = Buffer.from(expected);
  const b = Buffer.from(given);
  return a.length === b.length && timingSafeEqual(a, b);
}
