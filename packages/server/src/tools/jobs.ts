import { z } from "zod";
import {
  assetUploadJob,
  autofillJob,
  EXPORT_FILE_TYPES,
  exportJob,
  urlAssetUploadJob,
  type Job,
  type JobDefinition,
} from "@design-gateway/shared";
import { defineTool, type Tool } from "./types";

const MAX_JOB_TIMEOUT_MS = 30 * 60 * 1000;

const waitOptionsSchema = z.object({
  wait: z.boolean().default(true),
  timeout_ms: z.number().int().positive().max(MAX_JOB_TIMEOUT_MS).optional(),
});

export function serializeJob<TResult>(job: Job<TResult>) {
  const base = { id: job.id, kind: job.kind, status: job.status };
  switch (job.status) {
    case "success":
      return { ...base, result: job.result };
    case "failed":
      return { ...base, error: job.error };
    default:
      return base;
  }
}

interface JobToolDefinition<S extends z.ZodTypeAny, TInput, TResult> {
  name: string;
  description: string;
  input: S;
  definition: JobDefinition<TInput, TResult>;
  toInput(input: z.output<S>): TInput;
}

/**
 * Create a job and, unless `wait` is false, poll it to completion within
 * `timeout_ms`. The wait is cancelled when the caller disconnects.
 */
function createJobTool<S extends z.ZodTypeAny, TInput, TResult>(tool: JobToolDefinition<S, TInput, TResult>): Tool {
  return {
    name: tool.name,
    description: tool.description,
    kind: "job",
    run: async (args, { runtime, signal, log }) => {
      const options = waitOptionsSchema.parse(args ?? {});
      const input = tool.toInput(tool.input.parse(args ?? {}));

      if (!options.wait) {
        return serializeJob(await runtime.jobs.submit(tool.definition, input, signal));
      }

      const result = await runtime.jobs.submitAndAwait(tool.definition, input, {
        timeoutMs: options.timeout_ms,
        signal,
        onPoll: (job, attempt) => log.debug({ jobId: job.id, status: job.status, attempt }, "Job poll"),
      });
      return { kind: tool.definition.kind, status: "success", result };
    },
  };
}

function jobStatusTool<TInput, TResult>(name: string, description: string, definition: JobDefinition<TInput, TResult>): Tool {
  return defineTool({
    name,
    description,
    kind: "job",
    input: z.object({ job_id: z.string().min(1) }),
    handler: async ({ job_id }, { runtime, signal }) =>
      serializeJob(await runtime.jobs.status(definition, job_id, signal)),
  });
}

const base64 = z
  .string()
  .min(1)
  .regex(/^[A-Za-z0-9+/]+={0,2}$/, "Expected base64-encoded content");

const exportFormatSchema = z
  .union([
    z.enum(EXPORT_FILE_TYPES),
    z.object({
      type: z.enum(EXPORT_FILE_TYPES),
      pages: z.array(z.number().int().positive()).optional(),
      quality: z.union([z.string(), z.number()]).optional(),
      width: z.number().int().positive().optional(),
      height: z.number().int().positive().optional(),
    }),
  ])
  .transform((format) => (typeof format === "string" ? { type: format } : format));

export const jobTools: Tool[] = [
  createJobTool({
    name: "create_asset_upload_job",
    description: "Upload base64-encoded file content as an asset.",
    input: z.object({ name: z.string().min(1).max(255), content_base64: base64 }),
    definition: assetUploadJob,
    toInput: ({ name, content_base64 }) => ({ name, content: Buffer.from(content_base64, "base64") }),
  }),
  createJobTool({
    name: "create_url_asset_upload_job",
    description: "Import an asset from a public URL.",
    input: z.object({ name: z.string().min(1).max(255), url: z.string().url() }),
    definition: urlAssetUploadJob,
    toInput: (input) => input,
  }),
  createJobTool({
    name: "create_design_export_job",
    description: "Export a design and return the download URLs.",
    input: z.object({ design_id: z.string().min(1), format: exportFormatSchema }),
    definition: exportJob,
    toInput: ({ design_id, format }) => ({ designId: design_id, format }),
  }),
  createJobTool({
    name: "create_design_autofill_job",
    description: "Create a design from a brand template filled with the given data.",
    input: z.object({
      brand_template_id: z.string().min(1),
      data: z.record(z.unknown()),
      title: z.string().min(1).optional(),
    }),
    definition: autofillJob,
    toInput: ({ brand_template_id, data, title }) => ({ brandTemplateId: brand_template_id, data, title }),
  }),

  jobStatusTool("get_asset_upload_job", "Read the status of an asset upload job.", assetUploadJob),
  jobStatusTool("get_url_asset_upload_job", "Read the status of a URL asset upload job.", urlAssetUploadJob),
  jobStatusTool("get_design_export_job", "Read the status of a design export job.", exportJob),
  jobStatusTool("get_design_autofill_job", "Read the status of an autofill job.", autofillJob),
];
