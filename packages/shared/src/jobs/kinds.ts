/**
 * Job kinds of the Canva Connect API. Each is a small configuration handed to
 * the generic AsyncJobEngine.
 */

import { z } from "zod";
import type { JobDefinition } from "./types";

export const assetSchema = z
  .object({
    id: z.string(),
    name: z.string().optional(),
    tags: z.array(z.string()).optional(),
  })
  .passthrough();

export type Asset = z.infer<typeof assetSchema>;

export const EXPORT_FILE_TYPES = ["pdf", "jpg", "png", "gif", "pptx", "mp4"] as const;
export type ExportFileType = (typeof EXPORT_FILE_TYPES)[number];

export interface ExportFormat {
  type: ExportFileType;
  pages?: number[];
  quality?: string | number;
  width?: number;
  height?: number;
}

export const autofillResultSchema = z
  .object({
    type: z.string(),
    design: z.object({ id: z.string().optional(), url: z.string().optional() }).passthrough(),
  })
  .passthrough();

export type AutofillResult = z.infer<typeof autofillResultSchema>;

export interface AssetUploadInput {
  name: string;
  content: Uint8Array;
}

export interface UrlAssetUploadInput {
  name: string;
  url: string;
}

export interface ExportInput {
  designId: string;
  format: ExportFormat;
}

export interface AutofillInput {
  brandTemplateId: string;
  data: Record<string, unknown>;
  title?: string;
}

const jobPath = (collection: string, jobId: string) => `/${collection}/${encodeURIComponent(jobId)}`;

export const assetUploadJob: JobDefinition<AssetUploadInput, Asset> = {
  kind: "asset_upload",
  create: (input) => ({
    method: "POST",
    path: "/asset-uploads",
    headers: {
      "Asset-Upload-Metadata": JSON.stringify({
        name_base64: Buffer.from(input.name, "utf-8").toString("base64"),
      }),
    },
    body: { type: "binary", value: input.content },
  }),
  poll: (jobId) => ({ method: "GET", path: jobPath("asset-uploads", jobId) }),
  selectResult: (job) => job.asset,
  resultSchema: assetSchema,
};

export const urlAssetUploadJob: JobDefinition<UrlAssetUploadInput, Asset> = {
  kind: "url_asset_upload",
  create: (input) => ({
    method: "POST",
    path: "/url-asset-uploads",
    body: { type: "json", value: { name: input.name, url: input.url } },
  }),
  poll: (jobId) => ({ method: "GET", path: jobPath("url-asset-uploads", jobId) }),
  selectResult: (job) => job.asset,
  resultSchema: assetSchema,
};

export const exportJob: JobDefinition<ExportInput, string[]> = {
  kind: "export",
  create: (input) => ({
    method: "POST",
    path: "/exports",
    body: { type: "json", value: { design_id: input.designId, format: input.format } },
  }),
  poll: (jobId) => ({ method: "GET", path: jobPath("exports", jobId) }),
  selectResult: (job) => job.urls,
  resultSchema: z.array(z.string()),
};

export const autofillJob: JobDefinition<AutofillInput, AutofillResult> = {
  kind: "autofill",
  create: (input) => ({
    method: "POST",
    path: "/autofills",
    body: {
      type: "json",
      value: { brand_template_id: input.brandTemplateId, data: input.data, title: input.title },
    },
  }),
  poll: (jobId) => ({ method: "GET", path: jobPath("autofills", jobId) }),
  selectResult: (job) => job.result,
  resultSchema: autofillResultSchema,
};

export const JOB_DEFINITIONS = {
  asset_upload: assetUploadJob,
  url_asset_upload: urlAssetUploadJob,
  export: exportJob,
  autofill: autofillJob,
} as const;
