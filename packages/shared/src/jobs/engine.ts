import {
  JobCancelledError,
  JobFailedError,
  JobTimeoutError,
  MalformedResponseError,
} from "../errors";
import { DEFAULT_JOB_TIMEOUT_MS } from "../constants";
import type { HttpGateway } from "../http/gateway";
import { componentLogger, type Logger } from "../logger";
import { sleep as defaultSleep, withTimeout, type Sleep } from "../utils/abort";
import {
  DEFAULT_POLL_INTERVAL,
  jobEnvelopeSchema,
  type AwaitJobOptions,
  type Job,
  type JobDefinition,
  type PollIntervalPolicy,
} from "./types";

export interface AsyncJobEngineOptions {
  defaultTimeoutMs?: number;
  pollInterval?: Partial<PollIntervalPolicy>;
  logger?: Logger;
  sleep?: Sleep;
  now?: () => number;
}

/**
 * Parse a provider `{ job }` envelope into a Job, enforcing that a result
 * exists exactly when the job succeeded.
 */
export function parseJob<TInput, TResult>(
  definition: JobDefinition<TInput, TResult>,
  body: unknown,
  createdAt: number
): Job<TResult> {
  const envelope = jobEnvelopeSchema.safeParse(body);
  if (!envelope.success) {
    throw new MalformedResponseError(`Unexpected ${definition.kind} job response`, {
      cause: envelope.error,
    });
  }
  const raw = envelope.data.job;
  const base = { id: raw.id, kind: definition.kind, createdAt };

  switch (raw.status) {
    case "in_progress":
      return { ...base, status: "in_progress" };
    case "failed":
      return { ...base, status: "failed", error: raw.error ?? { message: "Job failed without a reported reason" } };
    case "success": {
      const result = definition.resultSchema.safeParse(definition.selectResult(raw));
      if (!result.success) {
        throw new MalformedResponseError(`${definition.kind} job ${raw.id} succeeded without a usable result`, {
          cause: result.error,
        });
      }
      return { ...base, status: "success", result: result.data };
    }
  }
}

/**
 * Jobs only move forward: in_progress -> success | failed, never back.
 */
export function advanceJob<TResult>(current: Job<TResult>, observed: Job<TResult>): Job<TResult> {
  if (observed.id !== current.id) {
    throw new MalformedResponseError(`Polled job ${current.id} but provider answered for ${observed.id}`);
  }
  if (current.status !== "in_progress") {
    throw new MalformedResponseError(
      `Job ${current.id} cannot move from ${current.status} to ${observed.status}`
    );
  }
  return { ...observed, createdAt: current.createdAt };
}

function settle<TResult>(job: Job<TResult>): TResult {
  switch (job.status) {
    case "success":
      return job.result;
    case "failed":
      throw new JobFailedError(job.id, job.error.message, job.error.code);
    case "in_progress":
      throw new MalformedResponseError(`Job ${job.id} is not finished`);
  }
}

/**
 * Drives create -> poll -> terminal for any job kind. Each call owns its own
 * loop; nothing is shared between jobs and nothing is kept once a call returns.
 */
export class AsyncJobEngine {
  private readonly defaultTimeoutMs: number;
  private readonly pollInterval: PollIntervalPolicy;
  private readonly logger: Logger;
  private readonly sleep: Sleep;
  private readonly now: () => number;

  constructor(
    private readonly gateway: Pick<HttpGateway, "execute">,
    options: AsyncJobEngineOptions = {}
  ) {
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_JOB_TIMEOUT_MS;
    this.pollInterval = { ...DEFAULT_POLL_INTERVAL, ...options.pollInterval };
    this.logger = componentLogger("job-engine", options.logger);
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  /** Create the job and return its first observed state. */
  submit<TInput, TResult>(
    definition: JobDefinition<TInput, TResult>,
    input: TInput,
    signal?: AbortSignal
  ): Promise<Job<TResult>> {
    return this.create(definition, input, signal);
  }

  /** Read a job's current state once. */
  status<TInput, TResult>(
    definition: JobDefinition<TInput, TResult>,
    jobId: string,
    signal?: AbortSignal
  ): Promise<Job<TResult>> {
    return this.read(definition, jobId, signal);
  }

  /**
   * Submit a job and poll it until it reaches a terminal status.
   * Resolves with the result; failure, timeout and cancellation reject with
   * JobFailedError, JobTimeoutError and JobCancelledError.
   */
  async submitAndAwait<TInput, TResult>(
    definition: JobDefinition<TInput, TResult>,
    input: TInput,
    options: AwaitJobOptions<TResult> = {}
  ): Promise<TResult> {
    const { signal } = options;
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const policy = { ...this.pollInterval, ...options.pollInterval };
    const factor = Math.max(1, policy.factor);
    const deadline = this.now() + timeoutMs;

    let job: Job<TResult>;
    const createSignal = withTimeout(signal, timeoutMs);
    try {
      job = await this.create(definition, input, createSignal, deadline);
    } catch (error) {
      if (signal?.aborted) throw new JobCancelledError();
      if (createSignal.aborted) throw this.timedOut(definition.kind, undefined, timeoutMs);
      throw error;
    }

    let interval = Math.min(policy.initialMs, policy.maxMs);
    let attempt = 0;

    while (job.status === "in_progress") {
      const remaining = deadline - this.now();
      if (remaining <= 0) {
        throw this.timedOut(definition.kind, job.id, timeoutMs);
      }

      try {
        await this.sleep(Math.min(interval, remaining), signal);
      } catch (error) {
        if (signal?.aborted) throw this.cancelled(definition.kind, job.id);
        throw error;
      }
      if (this.now() >= deadline) {
        throw this.timedOut(definition.kind, job.id, timeoutMs);
      }

      attempt += 1;
      const pollSignal = withTimeout(signal, Math.max(1, deadline - this.now()));
      try {
        job = advanceJob(job, await this.read(definition, job.id, pollSignal, deadline));
      } catch (error) {
        if (signal?.aborted) throw this.cancelled(definition.kind, job.id);
        if (pollSignal.aborted) throw this.timedOut(definition.kind, job.id, timeoutMs);
        throw error;
      }

      this.logger.debug({ kind: definition.kind, jobId: job.id, status: job.status, attempt }, "Job polled");
      options.onPoll?.(job, attempt);
      interval = Math.min(policy.maxMs, interval * factor);
    }

    if (job.status === "failed") {
      this.logger.warn({ kind: definition.kind, jobId: job.id, reason: job.error.message }, "Job failed");
    }
    return settle(job);
  }

  private async create<TInput, TResult>(
    definition: JobDefinition<TInput, TResult>,
    input: TInput,
    signal?: AbortSignal,
    deadline?: number
  ): Promise<Job<TResult>> {
    const createdAt = this.now();
    const body = await this.gateway.execute({ ...definition.create(input), signal, deadline });
    const job = parseJob(definition, body, createdAt);
    this.logger.info({ kind: definition.kind, jobId: job.id, status: job.status }, "Job created");
    return job;
  }

  private async read<TInput, TResult>(
    definition: JobDefinition<TInput, TResult>,
    jobId: string,
    signal?: AbortSignal,
    deadline?: number
  ): Promise<Job<TResult>> {
    const body = await this.gateway.execute({ ...definition.poll(jobId), signal, deadline });
    return parseJob(definition, body, this.now());
  }

  private timedOut(kind: string, jobId: string | undefined, timeoutMs: number): JobTimeoutError {
    this.logger.warn({ kind, jobId, timeoutMs }, "Stopped waiting for job");
    return new JobTimeoutError(jobId, timeoutMs);
  }

  private cancelled(kind: string, jobId: string): JobCancelledError {
    this.logger.info({ kind, jobId }, "Job wait cancelled");
    return new JobCancelledError(jobId);
  }
}
