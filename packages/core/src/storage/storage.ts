import { StorageRequestError } from "../shared/domain-error";
import type { PublicKey } from "../shared/public-key.vo";

/** One resource returned by a directory listing. */
export interface StorageEntry {
  /** Path inside the owner's storage, e.g. `/pub/paykit.app/v0/lightning`. */
  readonly path: string;
  /** Absolute address the resource can be fetched from. */
  readonly address: string;
}

export interface ListOptions {
  /** Only direct children; sub-directories show up as entries ending in "/". */
  readonly shallow: boolean;
}

/**
 * Unauthenticated view of the storage network.
 * Missing resources reject with a `StorageRequestError` of status 404 or 410.
 */
export interface PublicStorage {
  get(address: string): Promise<Uint8Array>;
  list(address: string, options: ListOptions): Promise<readonly StorageEntry[]>;
}

/** Authenticated view of one identity's storage. Paths are relative to its root. */
export interface SessionStorage {
  readonly owner: PublicKey;
  put(path: string, body: string): Promise<void>;
  /** Rejects when nothing exists at `path`. */
  delete(path: string): Promise<void>;
}

const NOT_FOUND_STATUSES: ReadonlySet<number> = new Set([404, 410]);

/** True when a storage call failed only because the resource does not exist. */
export function isNotFound(err: unknown): boolean {
  return (
    err instanceof StorageRequestError &&
    err.status !== undefined &&
    NOT_FOUND_STATUSES.has(err.status)
  );
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
