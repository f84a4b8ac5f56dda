import express from 'express';
import { TypedError } from '../../src/domain/errors';
import { PipelineEvent } from '../../src/domain/events';
import { ReleaseRecord } from '../../src/domain/release';
import { PipelineRun } from '../../src/domain/run';

/** The union of fields the API responds with. */
export interface ResponseBody {
  status?: string;
  ok?: boolean;
  run?: PipelineRun;
  release?: ReleaseRecord;
  items?: Array<Record<string, unknown>>;
  total?: number;
  limit?: number;
  offset?: number;
  hasMore?: boolean;
  artifacts?: Array<Record<string, unknown>>;
  events?: PipelineEvent[];
  ignored?: boolean;
  event?: string;
  error?: TypedError;
}

export interface HttpResponse {
  status: number;
  body: ResponseBody;
}

/** Serve `app` on an ephemeral port for one request. */
export async function request(
  app: express.Application,
  method: string,
  path: string,
  options: { body?: unknown; raw?: string; headers?: Record<string, string> } = {},
): Promise<HttpResponse> {
  const server = app.listen(0);
  await new Promise<void>((resolve) => server.once('listening', () => resolve()));
  try {
    const address = server.address();
    const port = typeof address === 'object' && address !== null ? address.port : 0;
    const payload = options.raw ?? (options.body === undefined ? undefined : JSON.stringify(options.body));
    const res = await fetch(`http://127.0.0.1:${port}${path}`, {
      method,
      headers: { 'Content-Type': 'application/json', ...options.headers },
      body: payload,
    });
    const text = await res.text();
    const body: ResponseBody = text ? JSON.parse(text) : {};
    return { status: res.status, body };
  } finally {
    await new Promise<void>((resolve) => {
      server.close(() => resolve());
      server.closeAllConnections();
    });
  }
}
