export { JobClient, JobLaunchError } from './services/jobClient';
export type { JobClientOptions, PollSettings } from './services/jobClient';
export { HttpError, createHttpClient, getBinary, getData, getStatusCode, joinUrl, postData } from './services/http';
export type { HttpClientOptions } from './services/http';
export { buildLaunchForm, classifyArguments, configObject, fileInput, outputPath } from './services/jobArguments';
export { PollTimeoutError, delay, nextSleepSeconds, pollStatus } from './services/statusPoller';
export { JobFinishedSchema, LaunchAcceptedSchema, OutputFileSchema } from './services/schemas';
export { formatElapsed } from './utils/formatElapsed';
export { DEFAULT_POLL_TIERS, ENV, STATUS, assertApiUrl } from './config/env';
export type * from './types';
