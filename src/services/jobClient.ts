import type { AxiosAdapter, AxiosInstance } from 'axios';
import { writeFile } from 'fs/promises';
import { resolve, sep } from 'path';
import { ENDPOINTS, STATUS, assertApiUrl } from '../config/env';
import type { JobArgument, JobRunResult, Logger, OutputFile, PollOptions } from '../types';
import { formatElapsed } from '../utils/formatElapsed';
import { createHttpClient, getBinary, getData, joinUrl, postData } from './http';
import { buildLaunchForm } from './jobArguments';
import { JobFinishedSchema, LaunchAcceptedSchema } from './schemas';
import { pollStatus } from './statusPoller';

export class JobLaunchError extends Error {
  readonly status: number;
  readonly body: unknown;

  constructor(status: number, body: unknown) {
    super(`Job was not accepted (HTTP ${status})`);
    this.name = 'JobLaunchError';
    this.status = status;
    this.body = body;
  }
}

export type PollSettings = Omit<PollOptions, 'ok' | 'error' | 'signal'>;

export interface JobClientOptions {
  apiUrl?: string;
  timeoutMs?: number;
  adapter?: AxiosAdapter;
  logger?: Logger;
  poll?: PollSettings;
}

const pretty = (value: unknown): string => JSON.stringify(value, null, 2);

export class JobClient {
  private readonly apiUrl: string;
  private readonly http: AxiosInstance;
  private readonly logger: Logger;
  private readonly poll: PollSettings;

  constructor(options: JobClientOptions = {}) {
    this.apiUrl = assertApiUrl(options.apiUrl);
    this.http = createHttpClient({ timeoutMs: options.timeoutMs, adapter: options.adapter });
    this.logger = options.logger ?? console;
    this.poll = options.poll ?? {};
  }

  statusUrl(token: string): string {
    return joinUrl(this.apiUrl, ENDPOINTS.STATUS + encodeURIComponent(token));
  }

  dataUrl(id: string): string {
    return joinUrl(this.apiUrl, ENDPOINTS.DATA + encodeURIComponent(id));
  }

  // Token only on 303.
  async launchJob(launchUrl: string, args: JobArgument[], signal?: AbortSignal): Promise<string | undefined> {
    const { status, body } = await this.submit(launchUrl, args, signal);
    return status === STATUS.LAUNCH_ACCEPTED ? LaunchAcceptedSchema.parse(body).token : undefined;
  }

  async checkJob(token: string, signal?: AbortSignal): Promise<OutputFile[] | undefined> {
    const url = this.statusUrl(token);
    const elapsed = await pollStatus(this.http, url, {
      ...this.poll,
      ok: STATUS.JOB_FINISHED,
      error: STATUS.JOB_FAILED,
      signal,
    });

    const response = await getData(this.http, url, signal);

    this.logger.log(`Total elapsed time: ${formatElapsed(elapsed)}`);
    this.logger.log('REST API JSON response:');
    this.logger.log(pretty(response.body));

    if (response.status !== STATUS.JOB_FINISHED) return undefined;

    return JobFinishedSchema.parse(response.body).output_files.map(({ id, name }) => ({ id, name }));
  }

  // Overwrites existing files; the first failed download aborts the rest.
  async retrieveData(
    outputFiles: OutputFile[] | undefined,
    outputDir = '.',
    signal?: AbortSignal
  ): Promise<string[]> {
    if (!outputFiles || outputFiles.length === 0) {
      this.logger.log('No files provided');
      return [];
    }

    const root = resolve(outputDir);
    const prefix = root.endsWith(sep) ? root : root + sep;
    const targets = outputFiles.map((file) => {
      const target = resolve(root, file.name);
      if (!target.startsWith(prefix)) {
        throw new Error(`Output file name escapes ${root}: ${file.name}`);
      }
      return target;
    });

    const written: string[] = [];
    for (const [index, file] of outputFiles.entries()) {
      const content = await getBinary(this.http, this.dataUrl(file.id), signal);
      await writeFile(targets[index], content);
      written.push(targets[index]);
    }
    return written;
  }

  async runJob(
    launchUrl: string,
    args: JobArgument[],
    options: { outputDir?: string; signal?: AbortSignal } = {}
  ): Promise<JobRunResult> {
    try {
      const { status, body } = await this.submit(launchUrl, args, options.signal);
      if (status !== STATUS.LAUNCH_ACCEPTED) {
        throw new JobLaunchError(status, body);
      }
      const { token } = LaunchAcceptedSchema.parse(body);

      const outputFiles = await this.checkJob(token, options.signal);
      const paths = await this.retrieveData(outputFiles, options.outputDir, options.signal);

      return { token, outputFiles, paths };
    } catch (error) {
      this.logger.error('Job run failed:', error);
      throw error;
    }
  }

  private async submit(launchUrl: string, args: JobArgument[], signal?: AbortSignal) {
    const { fields, files } = await buildLaunchForm(args);
    const response = await postData(this.http, launchUrl, fields, files, signal);
    this.logger.log(pretty(response.body));
    return response;
  }
}
