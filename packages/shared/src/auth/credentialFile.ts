/**
 * Credential file - persists the store's credential across restarts.
 * File permissions: 0o600 (owner read/write only)
 */

import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { Credential } from "./types";
import type { CredentialStore } from "./credentialStore";
import type { Logger } from "../logger";

const storedCredentialSchema = z.object({
  accessToken: z.string(),
  refreshToken: z.string(),
  expiresAt: z.number(),
  scopes: z.array(z.string()),
});

/**
 * Read a credential from disk. A missing file means "not authenticated".
 */
export async function readCredentialFile(file: string): Promise<Credential | null> {
  let content: string;
  try {
    content = await fs.readFile(file, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) return null;
    throw error;
  }

  const parsed = storedCredentialSchema.safeParse(JSON.parse(content));
  if (!parsed.success) {
    throw new Error(`Credential file ${file} is malformed: ${parsed.error.message}`);
  }
  return { ...parsed.data, scopes: new Set(parsed.data.scopes) };
}

/**
 * Write the credential (or remove the file when cleared) with secure permissions
 */
export async function writeCredentialFile(file: string, credential: Credential | null): Promise<void> {
  if (!credential) {
    await fs.rm(file, { force: true });
    return;
  }

  await fs.mkdir(path.dirname(file), { recursive: true });
  const stored: z.infer<typeof storedCredentialSchema> = {
    accessToken: credential.accessToken,
    refreshToken: credential.refreshToken,
    expiresAt: credential.expiresAt,
    scopes: [...credential.scopes],
  };
  await fs.writeFile(file, JSON.stringify(stored, null, 2), { mode: 0o600 });
  // Ensure permissions are correct when the file already existed
  await fs.chmod(file, 0o600);
}

/**
 * Mirror every store mutation to `file`. Writes are serialized so the file
 * always ends up holding the latest credential.
 */
export function persistCredentials(store: CredentialStore, file: string, logger: Logger): () => void {
  let pending: Promise<void> = Promise.resolve();

  return store.onChange((credential) => {
    pending = pending
      .then(() => writeCredentialFile(file, credential))
      .catch((error: unknown) => {
        logger.error({ err: error, file }, "Failed to persist credentials");
      });
  });
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
