export * from "./constants";
export * from "./errors";
export * from "./logger";

// Auth
export * from "./auth/types";
export * from "./auth/credentialStore";
export * from "./auth/credentialFile";
export * from "./auth/oauth";

// HTTP
export * from "./http/types";
export * from "./http/backoff";
export * from "./http/rateLimit";
export * from "./http/gateway";

// Jobs
export * from "./jobs/types";
export * from "./jobs/engine";
export * from "./jobs/kinds";

export * from "./utils/abort";
export * from "./runtime";
