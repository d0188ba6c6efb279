export interface ApiResponse<T = unknown> {
  status: number;
  body: T;
}

export interface OutputFile {
  id: string;
  name: string;
}

export interface FileInput {
  kind: 'file';
  name: string;
  path: string;
}

export interface OutputPath {
  kind: 'output';
  name: string;
  path: string;
}

export interface ConfigObject {
  kind: 'config';
  properties: Record<string, unknown>;
}

export type JobArgument = FileInput | OutputPath | ConfigObject;

export interface FileField {
  filename: string;
  content: Buffer;
}

export interface LaunchForm {
  fields: Record<string, string>;
  files: Record<string, FileField>;
}

// A tier without `below` applies to every remaining counter value.
export interface PollTier {
  below?: number;
  sleepSeconds: number;
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export type Logger = Pick<Console, 'log' | 'error'>;

export interface PollOptions {
  ok: number;
  error: number;
  tiers?: PollTier[];
  sleep?: Sleep;
  signal?: AbortSignal;
  maxAttempts?: number;
  maxWaitSeconds?: number;
}

export interface JobRunResult {
  token: string;
  outputFiles: OutputFile[] | undefined;
  paths: string[];
}
