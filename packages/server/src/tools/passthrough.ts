import { z } from "zod";
import { jsonBody, type GatewayRequest } from "@design-gateway/shared";
import { defineTool, type Tool } from "./types";

type ProviderRequest = Omit<GatewayRequest, "signal">;

interface PassthroughDefinition<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  input: S;
  request(input: z.output<S>): ProviderRequest;
}

/** A tool that is exactly one authenticated provider call; the response body is the result. */
function passthrough<S extends z.ZodTypeAny>(definition: PassthroughDefinition<S>): Tool {
  return defineTool({
    name: definition.name,
    description: definition.description,
    kind: "passthrough",
    input: definition.input,
    handler: (input, { runtime, signal }) => runtime.gateway.execute({ ...definition.request(input), signal }),
  });
}

const id = z.string().min(1);
const limit = z.number().int().min(1).max(100).default(50);
const pageToken = z.string().min(1).optional();
const seg = encodeURIComponent;

const none = z.object({});

const userTools = [
  passthrough({
    name: "get_current_user",
    description: "Get the user and team IDs of the authenticated user.",
    input: none,
    request: () => ({ method: "GET", path: "/users/me" }),
  }),
  passthrough({
    name: "get_user_profile",
    description: "Get the authenticated user's profile.",
    input: none,
    request: () => ({ method: "GET", path: "/users/me/profile" }),
  }),
  passthrough({
    name: "get_user_capabilities",
    description: "List the API capabilities available to the authenticated user.",
    input: none,
    request: () => ({ method: "GET", path: "/users/me/capabilities" }),
  }),
];

const designTools = [
  passthrough({
    name: "create_design",
    description: "Create a design, optionally from a preset design type or an asset.",
    input: z.object({
      title: z.string().min(1),
      design_type: z.record(z.unknown()).optional(),
      asset_id: id.optional(),
    }),
    request: (input) => ({ method: "POST", path: "/designs", body: jsonBody(input) }),
  }),
  passthrough({
    name: "list_designs",
    description: "List the user's designs, optionally filtered by a search query.",
    input: z.object({
      query: z.string().optional(),
      continuation: pageToken,
      ownership: z.enum(["any", "owned", "shared"]).optional(),
      sort_by: z.enum(["relevance", "modified_descending", "modified_ascending", "title_descending", "title_ascending"]).optional(),
    }),
    request: (input) => ({ method: "GET", path: "/designs", query: input }),
  }),
  passthrough({
    name: "get_design",
    description: "Get a design's metadata.",
    input: z.object({ design_id: id }),
    request: ({ design_id }) => ({ method: "GET", path: `/designs/${seg(design_id)}` }),
  }),
  passthrough({
    name: "get_design_pages",
    description: "List a design's pages.",
    input: z.object({ design_id: id, offset: z.number().int().min(1).optional(), limit: limit.optional() }),
    request: ({ design_id, offset, limit }) => ({
      method: "GET",
      path: `/designs/${seg(design_id)}/pages`,
      query: { offset, limit },
    }),
  }),
  passthrough({
    name: "get_design_export_formats",
    description: "List the export formats a design supports.",
    input: z.object({ design_id: id }),
    request: ({ design_id }) => ({ method: "GET", path: `/designs/${seg(design_id)}/export-formats` }),
  }),
];

const assetTools = [
  passthrough({
    name: "get_asset",
    description: "Get an asset's metadata.",
    input: z.object({ asset_id: id }),
    request: ({ asset_id }) => ({ method: "GET", path: `/assets/${seg(asset_id)}` }),
  }),
  passthrough({
    name: "update_asset",
    description: "Rename an asset or replace its tags.",
    input: z
      .object({ asset_id: id, name: z.string().min(1).optional(), tags: z.array(z.string()).optional() })
      .refine((input) => input.name !== undefined || input.tags !== undefined, {
        message: "Provide name or tags",
      }),
    request: ({ asset_id, name, tags }) => ({
      method: "PATCH",
      path: `/assets/${seg(asset_id)}`,
      body: jsonBody({ name, tags }),
    }),
  }),
  passthrough({
    name: "delete_asset",
    description: "Move an asset to the trash.",
    input: z.object({ asset_id: id }),
    request: ({ asset_id }) => ({ method: "DELETE", path: `/assets/${seg(asset_id)}` }),
  }),
];

const folderTools = [
  passthrough({
    name: "create_folder",
    description: "Create a folder under a parent folder (\"root\" for the top level).",
    input: z.object({ name: z.string().min(1), parent_folder_id: id.default("root") }),
    request: (input) => ({ method: "POST", path: "/folders", body: jsonBody(input) }),
  }),
  passthrough({
    name: "get_folder",
    description: "Get a folder's metadata.",
    input: z.object({ folder_id: id }),
    request: ({ folder_id }) => ({ method: "GET", path: `/folders/${seg(folder_id)}` }),
  }),
  passthrough({
    name: "update_folder",
    description: "Rename a folder.",
    input: z.object({ folder_id: id, name: z.string().min(1) }),
    request: ({ folder_id, name }) => ({
      method: "PATCH",
      path: `/folders/${seg(folder_id)}`,
      body: jsonBody({ name }),
    }),
  }),
  passthrough({
    name: "delete_folder",
    description: "Delete a folder. Its contents move to the trash.",
    input: z.object({ folder_id: id }),
    request: ({ folder_id }) => ({ method: "DELETE", path: `/folders/${seg(folder_id)}` }),
  }),
  passthrough({
    name: "list_folder_items",
    description: "List the items in a folder.",
    input: z.object({
      folder_id: id,
      limit,
      continuation: pageToken,
      item_types: z.array(z.enum(["design", "folder", "image"])).optional(),
    }),
    request: ({ folder_id, limit, continuation, item_types }) => ({
      method: "GET",
      path: `/folders/${seg(folder_id)}/items`,
      query: { limit, continuation, item_types: item_types?.join(",") },
    }),
  }),
  passthrough({
    name: "move_folder_item",
    description: "Move a design, folder or image into another folder.",
    input: z.object({ item_id: id, to_folder_id: id }),
    request: (input) => ({ method: "POST", path: "/folders/move", body: jsonBody(input) }),
  }),
];

const brandTemplateTools = [
  passthrough({
    name: "list_brand_templates",
    description: "List the brand templates the user can access.",
    input: z.object({ query: z.string().optional(), continuation: pageToken, limit }),
    request: (input) => ({ method: "GET", path: "/brand-templates", query: input }),
  }),
  passthrough({
    name: "get_brand_template",
    description: "Get a brand template's metadata.",
    input: z.object({ brand_template_id: id }),
    request: ({ brand_template_id }) => ({ method: "GET", path: `/brand-templates/${seg(brand_template_id)}` }),
  }),
  passthrough({
    name: "get_brand_template_dataset",
    description: "Get the autofill data fields of a brand template.",
    input: z.object({ brand_template_id: id }),
    request: ({ brand_template_id }) => ({
      method: "GET",
      path: `/brand-templates/${seg(brand_template_id)}/dataset`,
    }),
  }),
];

const commentTools = [
  passthrough({
    name: "create_comment_thread",
    description: "Start a comment thread on a design.",
    input: z.object({ design_id: id, message_plaintext: z.string().min(1), assignee_id: id.optional() }),
    request: ({ design_id, ...body }) => ({
      method: "POST",
      path: `/designs/${seg(design_id)}/comments`,
      body: jsonBody(body),
    }),
  }),
  passthrough({
    name: "create_comment_reply",
    description: "Reply to a comment thread.",
    input: z.object({ design_id: id, thread_id: id, message_plaintext: z.string().min(1) }),
    request: ({ design_id, thread_id, message_plaintext }) => ({
      method: "POST",
      path: `/designs/${seg(design_id)}/comments/${seg(thread_id)}/replies`,
      body: jsonBody({ message_plaintext }),
    }),
  }),
  passthrough({
    name: "get_comment_thread",
    description: "Get a comment thread.",
    input: z.object({ design_id: id, thread_id: id }),
    request: ({ design_id, thread_id }) => ({
      method: "GET",
      path: `/designs/${seg(design_id)}/comments/${seg(thread_id)}`,
    }),
  }),
  passthrough({
    name: "list_comment_replies",
    description: "List the replies in a comment thread.",
    input: z.object({ design_id: id, thread_id: id, limit, continuation: pageToken }),
    request: ({ design_id, thread_id, limit, continuation }) => ({
      method: "GET",
      path: `/designs/${seg(design_id)}/comments/${seg(thread_id)}/replies`,
      query: { limit, continuation },
    }),
  }),
];

export const passthroughTools: Tool[] = [
  ...userTools,
  ...designTools,
  ...assetTools,
  ...folderTools,
  ...brandTemplateTools,
  ...commentTools,
];
