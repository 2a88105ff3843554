import {
  addressPath,
  describeError,
  type ListOptions,
  ownerRoot,
  type PublicKey,
  type PublicStorage,
  type SessionStorage,
  type StorageEntry,
  StorageRequestError,
} from "@paykit/core";
import type { PubkyClientLike } from "./pubky-client";

// Only a numeric status property counts. The message text is never scanned.
function statusOf(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  for (const key of ["status", "statusCode"]) {
    const value: unknown = Reflect.get(err, key);
    if (typeof value === "number") return value;
  }
  return undefined;
}

/** Normalizes anything the SDK throws into a `StorageRequestError`. */
export function toStorageRequestError(
  err: unknown,
  request: string,
): StorageRequestError {
  if (err instanceof StorageRequestError) return err;
  return new StorageRequestError(
    `${request} failed: ${describeError(err)}`,
    statusOf(err),
    { cause: err },
  );
}

function responseError(request: string, response: Response): StorageRequestError {
  const reason = response.statusText ? ` ${response.statusText}` : "";
  return new StorageRequestError(
    `${request} failed: ${response.status}${reason}`,
    response.status,
  );
}

/** Unauthenticated reads from any homeserver through the Pubky SDK. */
export class PubkyPublicStorage implements PublicStorage {
  constructor(private readonly client: PubkyClientLike) {}

  async get(address: string): Promise<Uint8Array> {
    const request = `GET ${address}`;
    let response: Response;
    try {
      response = await this.client.fetch(address);
    } catch (err) {
      throw toStorageRequestError(err, request);
    }

    if (!response.ok) {
      throw responseError(request, response);
    }
    return new Uint8Array(await response.arrayBuffer());
  }

  async list(
    address: string,
    options: ListOptions,
  ): Promise<readonly StorageEntry[]> {
    let urls: string[];
    try {
      urls = await this.client.list(
        address,
        undefined,
        false,
        undefined,
        options.shallow,
      );
    } catch (err) {
      throw toStorageRequestError(err, `LIST ${address}`);
    }

    return urls.map((url) => ({ path: addressPath(url), address: url }));
  }
}

/**
 * Writes into `owner`'s storage with the session cookie held by a
 * signed-in SDK client.
 */
export class PubkySessionStorage implements SessionStorage {
  constructor(
    private readonly client: PubkyClientLike,
    readonly owner: PublicKey,
  ) {}

  put(path: string, body: string): Promise<void> {
    return this.send("PUT", path, body);
  }

  delete(path: string): Promise<void> {
    return this.send("DELETE", path);
  }

  private async send(
    method: "PUT" | "DELETE",
    path: string,
    body?: string,
  ): Promise<void> {
    const address = `${ownerRoot(this.owner)}${path}`;
    const request = `${method} ${address}`;
    let response: Response;
    try {
      response = await this.client.fetch(address, {
        method,
        body,
        credentials: "include",
      });
    } catch (err) {
      throw toStorageRequestError(err, request);
    }

    if (!response.ok) {
      throw responseError(request, response);
    }
  }
}
