import { setTimeout as delay } from 'node:timers/promises';
import type { Logger } from 'pino';
import { z } from 'zod';
import type { Transport } from './transport.js';
import type { EntityType, Job, JobStatus, VqlDocument } from './types.js';
import { ConfigurationError, SubmissionError, TransportError } from './types.js';
import { describeError } from './errors.js';

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

const defaultSleep: SleepFn = (ms, signal) => delay(ms, undefined, { signal });

export const DEFAULT_POLL_INTERVAL_MS = 5_000;
export const DEFAULT_MAX_WAIT_MS = 300_000;

const SUCCESS_STATUSES: ReadonlySet<JobStatus> = new Set<JobStatus>(['READY', 'COMPLETED']);
const TERMINAL_STATUSES: ReadonlySet<JobStatus> = new Set<JobStatus>([
  'READY',
  'COMPLETED',
  'FAILED',
  'TIMED_OUT',
]);

export const isSuccess = (job: Job): boolean => SUCCESS_STATUSES.has(job.status);

export const isTerminal = (job: Job): boolean => TERMINAL_STATUSES.has(job.status);

const submitResponseSchema = z.object({ id: z.string().min(1) });

const statusResponseSchema = z.object({ status: z.string() });

/**
 * The API is not consistent about casing or about READY vs COMPLETED, so
 * both are accepted as success. Anything unrecognised is still in flight.
 */
export function normalizeStatus(raw: string): JobStatus {
  const status = raw.trim().toUpperCase();
  switch (status) {
    case 'PENDING':
    case 'RUNNING':
    case 'READY':
    case 'COMPLETED':
    case 'FAILED':
    case 'TIMED_OUT':
      return status;
    case 'ERROR':
      return 'FAILED';
    default:
      return 'RUNNING';
  }
}

export interface SubmitParams {
  datasetId: string;
  query: VqlDocument;
  entityType: EntityType;
}

export interface WaitParams extends SubmitParams {
  pollIntervalMs: number;
  maxWaitMs: number;
  signal?: AbortSignal;
}

export interface JobPollerOptions {
  logger: Logger;
  /** Replaces the timer between status checks (tests) */
  sleep?: SleepFn;
}

/**
 * Submits export jobs and polls them to a terminal state.
 */
export class JobPoller {
  readonly #transport: Transport;
  readonly #logger: Logger;
  readonly #sleep: SleepFn;

  constructor(transport: Transport, options: JobPollerOptions) {
    this.#transport = transport;
    this.#logger = options.logger;
    this.#sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Submit a query and block until the job is READY/COMPLETED, FAILED, or
   * the accumulated wait reaches `maxWaitMs` (TIMED_OUT). FAILED and
   * TIMED_OUT come back as data; check the status before materializing.
   *
   * @throws ConfigurationError for a non-positive poll interval or negative max wait
   * @throws SubmissionError if the API rejects the query
   * @throws TransportError if any status check fails; it is not retried
   */
  async submitAndWait(params: WaitParams): Promise<Job> {
    const { pollIntervalMs, maxWaitMs, signal } = params;

    if (!Number.isFinite(pollIntervalMs) || pollIntervalMs <= 0) {
      throw new ConfigurationError(`pollIntervalMs must be a positive number, got ${pollIntervalMs}`);
    }
    if (!Number.isFinite(maxWaitMs) || maxWaitMs < 0) {
      throw new ConfigurationError(`maxWaitMs must be zero or more, got ${maxWaitMs}`);
    }

    let job = await this.submit(params);
    let waited = 0;

    for (;;) {
      job = await this.checkStatus(job);

      if (isTerminal(job)) {
        this.#logger.info({ jobId: job.id, status: job.status, waitedMs: waited }, 'export job finished');
        return job;
      }

      if (waited >= maxWaitMs) {
        this.#logger.warn({ jobId: job.id, waitedMs: waited, maxWaitMs }, 'export job timed out');
        return { ...job, status: 'TIMED_OUT' };
      }

      await this.#sleep(pollIntervalMs, signal);
      waited += pollIntervalMs;
    }
  }

  /**
   * Start an export job without waiting for it.
   */
  async submit(params: SubmitParams): Promise<Job> {
    const { datasetId, query, entityType } = params;

    const res = await this.#transport.request<unknown>(
      'GET',
      `/dataset/${datasetId}/export_context_async`,
      {
        query: {
          export_format: 'json',
          include_images: false,
          entity_type: entityType,
          vql: JSON.stringify(query),
        },
      }
    );

    if (!res.ok) {
      throw new SubmissionError(
        `Export submission rejected (${res.status}): ${describeError(res.body)}`,
        res.status,
        res.body
      );
    }

    const parsed = submitResponseSchema.safeParse(res.body);
    if (!parsed.success) {
      throw new SubmissionError('Export submission returned no job id', res.status, res.body);
    }

    this.#logger.info({ datasetId, jobId: parsed.data.id, entityType }, 'export job submitted');

    return {
      id: parsed.data.id,
      datasetId,
      query,
      entityType,
      status: 'PENDING',
      createdAt: new Date(),
    };
  }

  /**
   * Fetch the job's current status. Read-only; safe to repeat.
   *
   * @throws TransportError on a non-2xx answer or a body without a status
   */
  async checkStatus(job: Job): Promise<Job> {
    const res = await this.#transport.request<unknown>(
      'GET',
      `/dataset/${job.datasetId}/export_status`,
      { query: { export_task_id: job.id } }
    );

    if (!res.ok) {
      throw new TransportError(
        `Status check for job ${job.id} failed (${res.status}): ${describeError(res.body)}`,
        undefined,
        res.status,
        res.body
      );
    }

    const parsed = statusResponseSchema.safeParse(res.body);
    if (!parsed.success) {
      throw new TransportError(
        `Status check for job ${job.id} returned no status`,
        parsed.error,
        res.status,
        res.body
      );
    }

    const status = normalizeStatus(parsed.data.status);
    this.#logger.debug({ jobId: job.id, status, raw: parsed.data.status }, 'export job status');

    return { ...job, status };
  }
}
