import { z } from "zod";
import type { GatewayRequest } from "../http/types";

export type JobKind = "asset_upload" | "url_asset_upload" | "export" | "autofill";

export type JobStatus = "in_progress" | "success" | "failed";

export interface JobError {
  code?: string;
  message: string;
}

interface JobBase {
  id: string;
  kind: JobKind;
  createdAt: number;
}

export type Job<TResult> =
  | (JobBase & { status: "in_progress" })
  | (JobBase & { status: "success"; result: TResult })
  | (JobBase & { status: "failed"; error: JobError });

/** Request builders without the signal; the engine threads its own. */
export type JobRequest = Omit<GatewayRequest, "signal">;

/**
 * Everything that differs between job kinds. The engine is generic over these.
 */
export interface JobDefinition<TInput, TResult> {
  kind: JobKind;
  create(input: TInput): JobRequest;
  poll(jobId: string): JobRequest;
  /** Where the result lives inside the provider's `job` object. */
  selectResult(job: Record<string, unknown>): unknown;
  resultSchema: z.ZodType<TResult, z.ZodTypeDef, unknown>;
}

export interface PollIntervalPolicy {
  initialMs: number;
  factor: number;
  maxMs: number;
}

export const DEFAULT_POLL_INTERVAL: PollIntervalPolicy = {
  initialMs: 1000,
  factor: 1.5,
  maxMs: 10_000,
};

export interface AwaitJobOptions<TResult> {
  timeoutMs?: number;
  pollInterval?: Partial<PollIntervalPolicy>;
  signal?: AbortSignal;
  onPoll?: (job: Job<TResult>, attempt: number) => void;
}

export const jobErrorSchema = z.object({
  code: z.string().optional(),
  message: z.string(),
});

export const jobEnvelopeSchema = z.object({
  job: z
    .object({
      id: z.string().min(1),
      status: z.enum(["in_progress", "success", "failed"]),
      error: jobErrorSchema.optional(),
    })
    .passthrough(),
});
