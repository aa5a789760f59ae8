/**
 * Common test utilities and helpers
 * Reduces duplication across test files
 */

import { expect } from 'chai';
import sinon from 'sinon';
import { get } from 'node:http';
import type { Server } from 'node:net';
import type { AuthorizationHandler, CallbackResult } from '../handlers/types.js';
import type { RequestOptions } from '../types.js';

/**
 * Real fetch Response with a JSON body.
 */
export function jsonResponse(
  body: unknown,
  status = 200,
  headers: Record<string, string> = {}
): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers },
  });
}

export type FetchStub = sinon.SinonStub<
  Parameters<typeof fetch>,
  ReturnType<typeof fetch>
>;

export type FetchRoute = (init: RequestInit | undefined) => Response;

/**
 * Stub global fetch, answering each URL from `routes` and anything else with
 * a 404. Restored by `sinon.restore()`.
 */
export function stubFetch(routes: Record<string, FetchRoute>): FetchStub {
  const stub = sinon.stub(globalThis, 'fetch');
  stub.callsFake(async (input, init) => {
    const url = requestUrl(input);
    const route = routes[url];
    return route ? route(init) : jsonResponse({ error: 'not_found' }, 404);
  });
  return stub;
}

export function requestUrl(input: string | URL | Request): string {
  if (typeof input === 'string') return input;
  if (input instanceof URL) return input.href;
  return input.url;
}

/**
 * URLs fetched by a stub, in call order.
 */
export function fetchedUrls(stub: FetchStub): string[] {
  return stub.getCalls().map((call) => requestUrl(call.args[0]));
}

/**
 * Form body of a fetch call.
 */
export function formBody(init: RequestInit | undefined): URLSearchParams {
  return new URLSearchParams(typeof init?.body === 'string' ? init.body : '');
}

/**
 * Await a promise that must reject with `errorType`; returns the error.
 */
export async function expectRejection<E extends Error>(
  promise: Promise<unknown>,
  errorType: abstract new (...args: never[]) => E
): Promise<E> {
  try {
    await promise;
  } catch (error) {
    expect(error).to.be.instanceOf(errorType);
    if (error instanceof errorType) return error;
  }
  expect.fail(`Expected rejection with ${errorType.name}`);
}

/**
 * Assert `value` is an instance of `type` and return it narrowed.
 */
export function expectInstance<E>(
  value: unknown,
  type: abstract new (...args: never[]) => E
): E {
  expect(value).to.be.instanceOf(type);
  if (value instanceof type) return value;
  expect.fail(`Expected an instance of ${type.name}`);
}

/**
 * Options for {@link FakeAuthorizationHandler}
 */
export type FakeHandlerOptions = {
  /** Code to return (default `abc123`) */
  code?: string;
  /**
   * State to return; by default echoes the state in the presented URL. A
   * function derives the returned state from the presented one.
   */
  state?: string | null | ((presentedState: string) => string);
  /** Never complete `collect()` until the signal aborts */
  hang?: boolean;
  /** Reject `collect()` with this error */
  error?: Error;
};

/**
 * In-process handler standing in for a human with a browser.
 */
export class FakeAuthorizationHandler implements AuthorizationHandler {
  public readonly presentedUrls: string[] = [];
  public closeCount = 0;

  constructor(private readonly options: FakeHandlerOptions = {}) {}

  async present(authorizationUrl: string): Promise<void> {
    this.presentedUrls.push(authorizationUrl);
  }

  async collect(options: RequestOptions = {}): Promise<CallbackResult> {
    const { signal } = options;
    if (this.options.hang) {
      return new Promise<CallbackResult>((_resolve, reject) => {
        signal?.addEventListener('abort', () => reject(signal.reason), {
          once: true,
        });
      });
    }
    if (this.options.error) throw this.options.error;

    const code = this.options.code ?? 'abc123';
    const { state: configured } = this.options;
    const state =
      typeof configured === 'function'
        ? configured(this.lastState() ?? '')
        : configured === undefined
          ? this.lastState()
          : configured;
    return state === null ? { code } : { code, state };
  }

  async close(): Promise<void> {
    this.closeCount++;
  }

  lastState(): string | null {
    const last = this.presentedUrls.at(-1);
    return last ? new URL(last).searchParams.get('state') : null;
  }
}

/**
 * Issue a GET against a local listener the way a redirected browser would.
 */
export function sendCallback(
  url: string
): Promise<{ status: number; body: string }> {
  return new Promise((resolve, reject) => {
    get(url, (res) => {
      let body = '';
      res.setEncoding('utf8');
      res.on('data', (chunk: string) => {
        body += chunk;
      });
      res.on('end', () => resolve({ status: res.statusCode ?? 0, body }));
      res.on('error', reject);
    }).on('error', reject);
  });
}

/**
 * Listen on a free loopback port; returns the port.
 */
export async function listenOnLoopback(server: Server, port = 0): Promise<number> {
  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, '127.0.0.1', () => {
      server.off('error', reject);
      resolve();
    });
  });
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Server has no TCP address');
  }
  return address.port;
}

export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}
