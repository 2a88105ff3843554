import type { Logger } from "../logger/logger";
import { InvalidPublicKeyError, TransportError } from "../shared/domain-error";
import type {
  EndpointData,
  MethodId,
  SupportedPayments,
} from "../shared/payment-types";
import { PublicKey } from "../shared/public-key.vo";
import {
  contactsListAddress,
  isDirectoryPath,
  paymentListAddress,
  trailingSegment,
} from "./paths";
import {
  describeError,
  isNotFound,
  type PublicStorage,
  type StorageEntry,
} from "./storage";

export interface ResolveOptions {
  readonly logger: Logger;
  /** Endpoint documents fetched at once while building a payment list. */
  readonly fetchConcurrency: number;
}

export interface ResolvedEntry {
  readonly entry: StorageEntry;
  /** Last path segment: a method id or a contact key. */
  readonly segment: string;
}

const utf8 = new TextDecoder("utf-8", { fatal: true });

/** Shallow listing of `address`. A missing directory lists as empty. */
export async function listEntries(
  storage: PublicStorage,
  address: string,
  label: string,
): Promise<readonly StorageEntry[]> {
  try {
    return await storage.list(address, { shallow: true });
  } catch (err) {
    if (isNotFound(err)) return [];
    throw new TransportError(`${label}: ${describeError(err)}`, { cause: err });
  }
}

/** Document body as text, or `undefined` when it is missing or empty. */
export async function fetchText(
  storage: PublicStorage,
  address: string,
  label: string,
): Promise<string | undefined> {
  let bytes: Uint8Array;
  try {
    bytes = await storage.get(address);
  } catch (err) {
    if (isNotFound(err)) return undefined;
    throw new TransportError(`${label}: ${describeError(err)}`, { cause: err });
  }

  if (bytes.length === 0) return undefined;

  try {
    return utf8.decode(bytes);
  } catch (err) {
    throw new TransportError(`${label}: payload is not valid UTF-8`, {
      cause: err,
    });
  }
}

/**
 * Drops sub-directories and pairs each document with its last path segment.
 * A document whose path has no usable last segment fails the whole listing.
 */
export function resolveEntries(
  entries: readonly StorageEntry[],
  kind: string,
): ResolvedEntry[] {
  const resolved: ResolvedEntry[] = [];
  for (const entry of entries) {
    if (isDirectoryPath(entry.path)) continue;

    const segment = trailingSegment(entry.path);
    if (segment === undefined) {
      throw new TransportError(
        `invalid resource returned for ${kind} entry: "${entry.path}"`,
      );
    }
    resolved.push({ entry, segment });
  }
  return resolved;
}

async function mapInBatches<T, R>(
  items: readonly T[],
  batchSize: number,
  fn: (item: T) => Promise<R>,
): Promise<R[]> {
  const size = Math.max(1, Math.floor(batchSize));
  const results: R[] = [];
  for (let i = 0; i < items.length; i += size) {
    const batch = await Promise.all(items.slice(i, i + size).map(fn));
    results.push(...batch);
  }
  return results;
}

export async function collectSupportedPayments(
  storage: PublicStorage,
  payee: PublicKey,
  options: ResolveOptions,
): Promise<SupportedPayments> {
  const address = paymentListAddress(payee);
  const entries = await listEntries(storage, address, "list supported payments");
  options.logger.debug(`Listed ${entries.length} entries under ${address}`);

  const fetched = await mapInBatches(
    resolveEntries(entries, "supported payment"),
    options.fetchConcurrency,
    async ({ entry, segment }) => {
      const payload = await fetchText(
        storage,
        entry.address,
        `fetch endpoint ${segment}`,
      );
      if (payload === undefined) {
        // Listed but gone or emptied before the read.
        options.logger.warn(
          `Endpoint "${segment}" listed under ${address} has no content, skipping`,
        );
      }
      return { method: segment, payload };
    },
  );

  // Listing order decides which duplicate wins.
  const payments = new Map<MethodId, EndpointData>();
  for (const { method, payload } of fetched) {
    if (payload !== undefined) payments.set(method, payload);
  }
  return payments;
}

export async function collectKnownContacts(
  storage: PublicStorage,
  owner: PublicKey,
  options: ResolveOptions,
): Promise<PublicKey[]> {
  const address = contactsListAddress(owner);
  const entries = await listEntries(storage, address, "list known contacts");
  options.logger.debug(`Listed ${entries.length} entries under ${address}`);

  return resolveEntries(entries, "known contact").map(({ segment }) => {
    try {
      return PublicKey.parse(segment);
    } catch (err) {
      if (err instanceof InvalidPublicKeyError) {
        throw new TransportError(
          `invalid contact entry '${segment}': ${err.reason}`,
          { cause: err },
        );
      }
      throw err;
    }
  });
}
