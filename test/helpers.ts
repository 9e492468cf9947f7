import type { AxiosAdapter, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { type MiroConfig } from '../src/config';
import { createContext } from '../src/context';
import { type ToolContext, type ToolResult } from '../src/types';

export const TEST_CONFIG: MiroConfig = {
  clientId: 'test-client',
  clientSecret: 'test-secret',
  redirectUrl: 'http://localhost:8080/callback',
  apiBaseUrl: 'https://api.miro.test',
  authBaseUrl: 'https://miro.test',
};

export const TEST_TOKEN = 'test-token';

export interface RecordedRequest {
  method: string;
  url: string;
  params: Record<string, unknown> | undefined;
  body: unknown;
  authorization: string | undefined;
}

export interface FakeReply {
  status?: number;
  statusText?: string;
  body?: unknown;
}

type Reply = FakeReply | ((req: RecordedRequest) => FakeReply);

/**
 * In-process stand-in for the Miro REST API, plugged in as the axios
 * adapter.  Records every request; unmatched routes answer 404.
 */
export class FakeMiro {
  readonly requests: RecordedRequest[] = [];
  private readonly routes: Array<{ method: string; url: string; reply: Reply }> = [];

  on(method: string, url: string, reply: Reply): this {
    this.routes.push({ method: method.toUpperCase(), url, reply });
    return this;
  }

  readonly adapter: AxiosAdapter = async (config: InternalAxiosRequestConfig) => {
    const auth = config.headers.get('Authorization');
    const req: RecordedRequest = {
      method: (config.method ?? 'get').toUpperCase(),
      url: config.url ?? '',
      params: config.params,
      body: typeof config.data === 'string' ? JSON.parse(config.data) : config.data,
      authorization: typeof auth === 'string' ? auth : undefined,
    };
    this.requests.push(req);

    const route = this.routes.find((r) => r.method === req.method && r.url === req.url);
    const reply: FakeReply = !route
      ? { status: 404, body: { status: 404, message: `No route for ${req.method} ${req.url}` } }
      : typeof route.reply === 'function'
        ? route.reply(req)
        : route.reply;

    const status = reply.status ?? 200;
    const response: AxiosResponse<unknown> = {
      data: reply.body,
      status,
      statusText: reply.statusText ?? (status === 200 ? 'OK' : ''),
      headers: {},
      config,
    };
    return response;
  };
}

/** A ToolContext whose MiroClient talks to `fake`. */
export function createTestContext(fake: FakeMiro, opts: { authenticated?: boolean } = {}) {
  const context: ToolContext = createContext(TEST_CONFIG, { adapter: fake.adapter });
  if (opts.authenticated ?? true) {
    context.credentials.setToken(TEST_TOKEN);
  }
  return context;
}

/** Parse the JSON text of the first content item. */
export function parseResult(result: ToolResult): unknown {
  return JSON.parse(result.content[0].text);
}

/** Await `promise` and return what it rejected with. */
export async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error: unknown) {
    return error;
  }
  throw new Error('expected promise to reject');
}

/** Run `fn` and return what it threw. */
export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error: unknown) {
    return error;
  }
  throw new Error('expected function to throw');
}
