/**
 * captchaSolver.ts — CapSolver client for DataDome slider challenges.
 *
 * Flow: `createTask` with a DatadomeSliderTask that names the challenge URL,
 * the page it was served on, the browser's user agent and the SOCKS5 relay
 * lease, then poll `getTaskResult` until the task is ready.  The solution
 * is a `datadome=…` cookie string the newspaper adapter installs.
 *
 * Every way this can go wrong (declined task, API error, polling past the
 * deadline, a banned-IP challenge) surfaces as `SolverFailure`.
 */

import { SolverFailure } from '../core/errors';
import { Logger } from '../core/logger';
import type { CaptchaChallenge, ProxyEndpoint } from '../core/types';
import { sleep } from '../middleware/humanBehavior';
import { lightFetch, type LightFetchResult } from '../middleware/lightFetcher';

const logger = new Logger('CaptchaSolver');

const CAPSOLVER_API = 'https://api.capsolver.com';

/** The external solving service, as the state machine sees it. */
export interface CaptchaSolver {
  /** Resolves with the solved token; rejects with SolverFailure. */
  solve(challenge: CaptchaChallenge, proxy: ProxyEndpoint): Promise<string>;
}

export interface CapSolverOptions {
  apiKey: string;
  /** Upper bound for one solve, submission included. */
  timeoutMs: number;
  pollIntervalMs?: number;
}

interface CapSolverReply {
  errorId: number;
  errorCode?: string;
  errorDescription?: string;
  taskId?: string;
  status?: string;
  cookie?: string;
}

/** Parse a CapSolver JSON reply into the few fields used here. */
export function parseCapSolverReply(body: string): CapSolverReply {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (err) {
    throw new SolverFailure('CapSolver returned a non-JSON response', { cause: err });
  }
  if (typeof parsed !== 'object' || parsed === null) {
    throw new SolverFailure('CapSolver returned an empty response');
  }
  const reply: object = parsed;

  const field = (key: string): unknown => (key in reply ? Reflect.get(reply, key) : undefined);
  const text = (key: string): string | undefined => {
    const value = field(key);
    return typeof value === 'string' ? value : undefined;
  };

  const solution = field('solution');
  const cookie =
    typeof solution === 'object' && solution !== null && 'cookie' in solution && typeof solution.cookie === 'string'
      ? solution.cookie
      : undefined;
  const errorId = field('errorId');

  return {
    errorId: typeof errorId === 'number' ? errorId : 0,
    errorCode: text('errorCode'),
    errorDescription: text('errorDescription'),
    taskId: text('taskId'),
    status: text('status'),
    cookie,
  };
}

/** CapSolver's proxy notation: `socks5:host:port:user:pass`. */
export function formatCapSolverProxy(proxy: ProxyEndpoint): string {
  return `socks5:${proxy.host}:${proxy.port}:${proxy.username}:${proxy.password}`;
}

export class CapSolverClient implements CaptchaSolver {
  private readonly pollIntervalMs: number;

  constructor(private readonly options: CapSolverOptions) {
    this.pollIntervalMs = options.pollIntervalMs ?? 3_000;
  }

  async solve(challenge: CaptchaChallenge, proxy: ProxyEndpoint): Promise<string> {
    // DataDome marks a banned IP with t=bv; no solver can pass that.
    if (challenge.captchaUrl.includes('t=bv')) {
      throw new SolverFailure('DataDome has banned this IP (t=bv); the challenge cannot be solved');
    }

    const deadline = Date.now() + this.options.timeoutMs;
    const created = await this.call('createTask', {
      task: {
        type: 'DatadomeSliderTask',
        websiteURL: challenge.websiteUrl,
        captchaUrl: challenge.captchaUrl,
        userAgent: challenge.userAgent,
        proxy: formatCapSolverProxy(proxy),
      },
    });

    if (created.cookie) return created.cookie;
    if (!created.taskId) throw new SolverFailure('CapSolver did not return a task id');

    logger.info(`Submitted DataDome task ${created.taskId}`);

    while (Date.now() < deadline) {
      await sleep(Math.min(this.pollIntervalMs, Math.max(0, deadline - Date.now())));

      const result = await this.call('getTaskResult', { taskId: created.taskId });
      if (result.status === 'ready') {
        if (!result.cookie) throw new SolverFailure('CapSolver finished without a cookie');
        logger.info(`Task ${created.taskId} solved`);
        return result.cookie;
      }
      if (result.status === 'failed') {
        throw new SolverFailure(`CapSolver task ${created.taskId} failed`);
      }
      logger.debug(`Task ${created.taskId} status=${result.status ?? 'unknown'}`);
    }

    throw new SolverFailure(
      `CapSolver did not solve the challenge within ${Math.round(this.options.timeoutMs / 1000)}s`,
    );
  }

  private async call(method: 'createTask' | 'getTaskResult', payload: Record<string, unknown>): Promise<CapSolverReply> {
    let response: LightFetchResult;
    try {
      response = await lightFetch(`${CAPSOLVER_API}/${method}`, {
        method: 'POST',
        json: { clientKey: this.options.apiKey, ...payload },
        timeout: 30_000,
      });
    } catch (err) {
      throw new SolverFailure(`CapSolver ${method} request failed`, { cause: err });
    }

    const reply = parseCapSolverReply(response.body);
    if (reply.errorId !== 0) {
      throw new SolverFailure(
        `CapSolver ${method} error ${reply.errorCode ?? reply.errorId}: ${reply.errorDescription ?? 'no description'}`,
      );
    }
    if (response.statusCode >= 400) {
      throw new SolverFailure(`CapSolver ${method} returned HTTP ${response.statusCode}`);
    }
    return reply;
  }
}

/** Stand-in used when no API key is configured. */
export class UnconfiguredSolver implements CaptchaSolver {
  solve(): Promise<string> {
    return Promise.reject(new SolverFailure('CAPTCHA encountered but CAPSOLVER_API_KEY is not configured'));
  }
}
