import type { PollTier } from '../types';

type JobApiEnv = {
  apiBaseUrl: string;
};

// JOB_API_URL is only a fallback; an explicit apiUrl option always wins.
export const ENV: JobApiEnv = {
  apiBaseUrl: process.env.JOB_API_URL ?? '',
};

export function assertApiUrl(apiUrl: string | undefined): string {
  const resolved = apiUrl || ENV.apiBaseUrl;
  if (!resolved) {
    throw new Error('Missing API URL. Pass apiUrl to the JobClient or set JOB_API_URL.');
  }
  return resolved;
}

export const REQUEST_TIMEOUT_MS = 120_000;

export const DEFAULT_POLL_TIERS: PollTier[] = [
  { below: 10, sleepSeconds: 1 },
  { below: 60, sleepSeconds: 10 },
  { sleepSeconds: 60 },
];

export const STATUS = {
  LAUNCH_ACCEPTED: 303,
  JOB_FINISHED: 200,
  JOB_FAILED: 500,
} as const;

export const CONFIG_FIELD = 'config';
export const CONFIG_FILENAME = 'prop.json';

export const ENDPOINTS = {
  STATUS: 'retrieve/status/',
  DATA: 'retrieve/data/',
};
