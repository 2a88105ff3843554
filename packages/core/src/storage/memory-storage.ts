import { StorageRequestError } from "../shared/domain-error";
import type { PublicKey } from "../shared/public-key.vo";
import {
  addressPath,
  isDirectoryPath,
  ownerRoot,
  PUBKY_SCHEME,
} from "./paths";
import type {
  ListOptions,
  PublicStorage,
  SessionStorage,
  StorageEntry,
} from "./storage";

const encoder = new TextEncoder();

function assertPubkyAddress(address: string): void {
  if (!address.startsWith(PUBKY_SCHEME)) {
    throw new StorageRequestError(`Unsupported address: ${address}`, 400);
  }
}

/**
 * In-process storage following Pubky semantics: documents addressed by
 * `pubky://<key>/<path>`, directories implied by their documents.
 *
 * @example
 * ```ts
 * const storage = new MemoryStorage();
 * const writer = new StorageAuthenticatedTransport(storage.session(alice));
 * const reader = new StorageTransportRead(storage);
 * ```
 */
export class MemoryStorage implements PublicStorage {
  private readonly documents = new Map<string, Uint8Array>();

  async get(address: string): Promise<Uint8Array> {
    const body = this.documents.get(address);
    if (body === undefined) {
      throw new StorageRequestError(`Not found: ${address}`, 404);
    }
    return body.slice();
  }

  async list(
    address: string,
    options: ListOptions,
  ): Promise<readonly StorageEntry[]> {
    assertPubkyAddress(address);
    const directory = isDirectoryPath(address) ? address : `${address}/`;

    const children = new Set<string>();
    for (const key of this.documents.keys()) {
      if (!key.startsWith(directory)) continue;
      const rest = key.slice(directory.length);
      const slash = rest.indexOf("/");
      if (options.shallow && slash !== -1) {
        children.add(`${directory}${rest.slice(0, slash + 1)}`);
      } else {
        children.add(key);
      }
    }

    if (children.size === 0) {
      throw new StorageRequestError(`Not found: ${directory}`, 404);
    }

    return [...children].sort().map((child) => ({
      path: addressPath(child),
      address: child,
    }));
  }

  /** Authenticated view of `owner`'s storage. */
  session(owner: PublicKey): SessionStorage {
    const root = ownerRoot(owner);
    const documents = this.documents;

    function resolve(path: string): string {
      if (!path.startsWith("/") || isDirectoryPath(path)) {
        throw new StorageRequestError(`Invalid document path: ${path}`, 400);
      }
      return `${root}${path}`;
    }

    return {
      owner,
      async put(path: string, body: string): Promise<void> {
        documents.set(resolve(path), encoder.encode(body));
      },
      async delete(path: string): Promise<void> {
        if (!documents.delete(resolve(path))) {
          throw new StorageRequestError(`Not found: ${root}${path}`, 404);
        }
      },
    };
  }

  /** Stores raw bytes at an absolute address, bypassing any session. */
  seed(address: string, body: Uint8Array | string): void {
    assertPubkyAddress(address);
    this.documents.set(
      address,
      typeof body === "string" ? encoder.encode(body) : body,
    );
  }

  clear(): void {
    this.documents.clear();
  }
}
