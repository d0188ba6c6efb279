import type { AxiosAdapter, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { vi } from 'vitest';

export interface FakeReply {
  status: number;
  body?: unknown;
  raw?: string | Buffer;
}

export interface RecordedRequest {
  method: string;
  url: string;
  data: unknown;
  maxRedirects?: number;
}

/**
 * In-process stand-in for the job API. Each URL answers from its own queue of
 * replies; the last reply repeats once the queue is down to one entry.
 */
export class FakeApi {
  readonly requests: RecordedRequest[] = [];
  private readonly routes = new Map<string, FakeReply[]>();

  on(url: string, ...replies: FakeReply[]): this {
    this.routes.set(url, replies);
    return this;
  }

  readonly adapter: AxiosAdapter = async (config: InternalAxiosRequestConfig) => {
    const url = config.url ?? '';
    this.requests.push({
      method: (config.method ?? 'get').toUpperCase(),
      url,
      data: config.data,
      maxRedirects: config.maxRedirects,
    });

    const queue = this.routes.get(url);
    const reply = queue && queue.length > 1 ? queue.shift() : queue?.[0];
    if (!reply) {
      throw new Error(`FakeApi: no route for ${url}`);
    }

    const response: AxiosResponse = {
      data: reply.raw ?? JSON.stringify(reply.body ?? {}),
      status: reply.status,
      statusText: String(reply.status),
      headers: {},
      config,
    };
    return response;
  };

  requestsTo(url: string): RecordedRequest[] {
    return this.requests.filter((r) => r.url === url);
  }
}

export function formOf(request: RecordedRequest | undefined): FormData {
  if (!request || !(request.data instanceof FormData)) {
    throw new Error('Expected a multipart request');
  }
  return request.data;
}

export async function fileEntry(form: FormData, name: string): Promise<{ filename: string; text: string }> {
  const entry = form.get(name);
  if (entry === null || typeof entry === 'string') {
    throw new Error(`Expected a file attachment named ${name}`);
  }
  return { filename: entry.name, text: await entry.text() };
}

export const silentLogger = () => ({ log: vi.fn(), error: vi.fn() });
