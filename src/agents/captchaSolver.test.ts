import { describe, it, expect, vi, beforeEach } from 'vitest';
import { SolverFailure } from '../core/errors';
import type { CaptchaChallenge, ProxyEndpoint } from '../core/types';
import { lightFetch } from '../middleware/lightFetcher';
import {
  CapSolverClient,
  formatCapSolverProxy,
  parseCapSolverReply,
  UnconfiguredSolver,
} from './captchaSolver';

vi.mock('../middleware/lightFetcher', () => ({
  lightFetch: vi.fn(),
}));

const fetchMock = vi.mocked(lightFetch);

const challenge: CaptchaChallenge = {
  kind: 'datadome',
  captchaUrl: 'https://geo.captcha-delivery.com/captcha/?initialCid=abc&t=fe',
  websiteUrl: 'https://www.wsj.com/client/login',
  userAgent: 'test-agent/1.0',
};

const proxy: ProxyEndpoint = {
  host: 'relay.test',
  port: 3333,
  username: 'lease_user',
  password: 'test-secret',
};

function reply(body: unknown, statusCode = 200) {
  return { body: JSON.stringify(body), statusCode, headers: {} };
}

function client(timeoutMs = 1_000): CapSolverClient {
  return new CapSolverClient({ apiKey: 'test-key', timeoutMs, pollIntervalMs: 1 });
}

beforeEach(() => {
  fetchMock.mockReset();
});

describe('CapSolverClient', () => {
  it('submits a DataDome task through the leased proxy and polls for the cookie', async () => {
    fetchMock
      .mockResolvedValueOnce(reply({ errorId: 0, taskId: 'task-1' }))
      .mockResolvedValueOnce(reply({ errorId: 0, status: 'processing' }))
      .mockResolvedValueOnce(reply({ errorId: 0, status: 'ready', solution: { cookie: 'datadome=solved; Path=/' } }));

    await expect(client().solve(challenge, proxy)).resolves.toBe('datadome=solved; Path=/');

    expect(fetchMock).toHaveBeenCalledTimes(3);
    expect(fetchMock).toHaveBeenNthCalledWith(1, 'https://api.capsolver.com/createTask', {
      method: 'POST',
      json: {
        clientKey: 'test-key',
        task: {
          type: 'DatadomeSliderTask',
          websiteURL: 'https://www.wsj.com/client/login',
          captchaUrl: challenge.captchaUrl,
          userAgent: 'test-agent/1.0',
          proxy: 'socks5:relay.test:3333:lease_user:test-secret',
        },
      },
      timeout: 30_000,
    });
    expect(fetchMock).toHaveBeenNthCalledWith(2, 'https://api.capsolver.com/getTaskResult', {
      method: 'POST',
      json: { clientKey: 'test-key', taskId: 'task-1' },
      timeout: 30_000,
    });
  });

  it('returns a cookie delivered with the task', async () => {
    fetchMock.mockResolvedValueOnce(reply({ errorId: 0, solution: { cookie: 'datadome=fast' } }));

    await expect(client().solve(challenge, proxy)).resolves.toBe('datadome=fast');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('refuses a banned-IP challenge without calling the service', async () => {
    const banned = { ...challenge, captchaUrl: 'https://geo.captcha-delivery.com/captcha/?t=bv' };

    await expect(client().solve(banned, proxy)).rejects.toBeInstanceOf(SolverFailure);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('surfaces API errors as SolverFailure', async () => {
    fetchMock.mockResolvedValueOnce(
      reply({ errorId: 1, errorCode: 'ERROR_KEY_DENIED_ACCESS', errorDescription: 'bad key' }),
    );

    await expect(client().solve(challenge, proxy)).rejects.toThrow(
      'CapSolver createTask error ERROR_KEY_DENIED_ACCESS: bad key',
    );
  });

  it('surfaces a failed task as SolverFailure', async () => {
    fetchMock
      .mockResolvedValueOnce(reply({ errorId: 0, taskId: 'task-2' }))
      .mockResolvedValueOnce(reply({ errorId: 0, status: 'failed' }));

    await expect(client().solve(challenge, proxy)).rejects.toThrow('CapSolver task task-2 failed');
  });

  it('surfaces network errors as SolverFailure', async () => {
    fetchMock.mockRejectedValueOnce(new Error('ECONNRESET'));

    await expect(client().solve(challenge, proxy)).rejects.toBeInstanceOf(SolverFailure);
  });

  it('gives up at the deadline', async () => {
    fetchMock
      .mockResolvedValueOnce(reply({ errorId: 0, taskId: 'task-3' }))
      .mockResolvedValue(reply({ errorId: 0, status: 'processing' }));

    await expect(client(20).solve(challenge, proxy)).rejects.toThrow(/did not solve the challenge/);
  });
});

describe('parseCapSolverReply', () => {
  it('rejects non-JSON bodies', () => {
    expect(() => parseCapSolverReply('<html>502</html>')).toThrow(SolverFailure);
  });

  it('ignores fields of the wrong type', () => {
    expect(parseCapSolverReply('{"errorId":0,"taskId":42,"solution":{"cookie":null}}')).toEqual({
      errorId: 0,
      errorCode: undefined,
      errorDescription: undefined,
      taskId: undefined,
      status: undefined,
      cookie: undefined,
    });
  });
});

describe('formatCapSolverProxy', () => {
  it('uses the socks5:host:port:user:pass form', () => {
    expect(formatCapSolverProxy(proxy)).toBe('socks5:relay.test:3333:lease_user:test-secret');
  });
});

describe('UnconfiguredSolver', () => {
  it('always fails', async () => {
    await expect(new UnconfiguredSolver().solve()).rejects.toBeInstanceOf(SolverFailure);
  });
});
