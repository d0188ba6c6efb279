import axios from 'axios';
import type { AxiosAdapter, AxiosInstance } from 'axios';
import { REQUEST_TIMEOUT_MS } from '../config/env';
import type { ApiResponse, FileField } from '../types';

export class HttpError extends Error {
  readonly status: number;
  readonly url: string;
  readonly responseText?: string;

  constructor(args: { status: number; url: string; message: string; responseText?: string }) {
    super(args.message);
    this.name = 'HttpError';
    this.status = args.status;
    this.url = args.url;
    this.responseText = args.responseText;
  }
}

export interface HttpClientOptions {
  timeoutMs?: number;
  adapter?: AxiosAdapter;
}

// Callers decide on the status code, so axios never throws on 3xx/5xx.
export function createHttpClient(options: HttpClientOptions = {}): AxiosInstance {
  return axios.create({
    timeout: options.timeoutMs ?? REQUEST_TIMEOUT_MS,
    validateStatus: () => true,
    ...(options.adapter ? { adapter: options.adapter } : {}),
  });
}

function parseJson(text: unknown): unknown {
  return JSON.parse(typeof text === 'string' ? text : String(text));
}

export async function getData(
  client: AxiosInstance,
  url: string,
  signal?: AbortSignal
): Promise<ApiResponse> {
  const response = await client.get<string>(url, {
    responseType: 'text',
    transformResponse: [(data) => data],
    signal,
  });

  return { status: response.status, body: parseJson(response.data) };
}

export async function postData(
  client: AxiosInstance,
  url: string,
  fields: Record<string, string>,
  files: Record<string, FileField>,
  signal?: AbortSignal
): Promise<ApiResponse> {
  const formData = new FormData();
  for (const [name, value] of Object.entries(fields)) {
    formData.append(name, value);
  }
  for (const [name, file] of Object.entries(files)) {
    formData.append(name, new Blob([file.content]), file.filename);
  }

  // 303 carries the token, so it must not be followed.
  const response = await client.post<string>(url, formData, {
    maxRedirects: 0,
    responseType: 'text',
    transformResponse: [(data) => data],
    signal,
  });

  return { status: response.status, body: parseJson(response.data) };
}

export async function getStatusCode(
  client: AxiosInstance,
  url: string,
  signal?: AbortSignal
): Promise<number> {
  const response = await client.get(url, {
    responseType: 'text',
    transformResponse: [(data) => data],
    signal,
  });
  return response.status;
}

export async function getBinary(
  client: AxiosInstance,
  url: string,
  signal?: AbortSignal
): Promise<Buffer> {
  const response = await client.get<ArrayBuffer>(url, {
    responseType: 'arraybuffer',
    signal,
  });

  const content = Buffer.from(response.data);

  if (response.status < 200 || response.status >= 300) {
    throw new HttpError({
      status: response.status,
      url,
      message: `HTTP ${response.status} ${response.statusText}`,
      responseText: content.toString('utf8'),
    });
  }

  return content;
}

export function joinUrl(base: string, path: string): string {
  return `${base.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}
