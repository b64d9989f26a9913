/**
 * In-memory holder of the current OAuth credential.
 * Every operation runs under one lock; nothing here touches the network or disk.
 */

import { Mutex } from "../utils/mutex";
import type { Credential } from "./types";

export type CredentialListener = (credential: Credential | null) => void;

export class CredentialStore {
  private credential: Credential | null;
  private readonly lock = new Mutex();
  private readonly listeners = new Set<CredentialListener>();

  constructor(initial: Credential | null = null) {
    this.credential = initial;
  }

  get(): Promise<Credential | null> {
    return this.lock.runExclusive(() => this.credential);
  }

  set(credential: Credential): Promise<void> {
    return this.lock.runExclusive(() => this.replace(credential));
  }

  clear(): Promise<void> {
    return this.lock.runExclusive(() => this.replace(null));
  }

  /**
   * Swap in `next` only if the stored credential is still `expected`.
   * Returns false when another writer got there first (or the store was cleared).
   */
  compareAndSet(expected: Credential, next: Credential): Promise<boolean> {
    return this.lock.runExclusive(() => {
      if (this.credential !== expected) return false;
      this.replace(next);
      return true;
    });
  }

  /** Clear only if `expected` is still the stored credential. */
  compareAndClear(expected: Credential): Promise<boolean> {
    return this.lock.runExclusive(() => {
      if (this.credential !== expected) return false;
      this.replace(null);
      return true;
    });
  }

  /** Observe mutations; returns an unsubscribe function. */
  onChange(listener: CredentialListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private replace(next: Credential | null): void {
    this.credential = next;
    for (const listener of this.listeners) {
      listener(next);
    }
  }
}

/** True when the credential expires within `marginMs` of `now`. */
export function isCredentialExpiring(credential: Credential, marginMs: number, now: number): boolean {
  return credential.expiresAt - now < marginMs;
}
