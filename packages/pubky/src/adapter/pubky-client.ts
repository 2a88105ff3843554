import { describeError, TransportError } from "@paykit/core";

/** The part of the `@synonymdev/pubky` `Client` Paykit relies on. */
export interface PubkyClientLike {
  fetch(url: string, init?: RequestInit): Promise<Response>;
  list(
    url: string,
    cursor?: string,
    reverse?: boolean,
    limit?: number,
    shallow?: boolean,
  ): Promise<string[]>;
}

interface PubkyClientConstructor {
  new (): PubkyClientLike;
  testnet?: () => PubkyClientLike;
}

export interface LoadPubkyClientOptions {
  /** Use the local testnet relays and homeserver instead of mainnet. */
  readonly testnet: boolean;
}

/**
 * Builds a Pubky SDK client.
 * Lazy-loads `@synonymdev/pubky` (WebAssembly) on first use.
 */
export async function loadPubkyClient(
  options: LoadPubkyClientOptions,
): Promise<PubkyClientLike> {
  let mod: unknown;
  try {
    mod = await import("@synonymdev/pubky");
  } catch (err) {
    throw new TransportError(
      `failed to load @synonymdev/pubky: ${describeError(err)}`,
      { cause: err },
    );
  }

  if (
    !mod ||
    typeof mod !== "object" ||
    !("Client" in mod) ||
    typeof mod.Client !== "function"
  ) {
    throw new TransportError("@synonymdev/pubky module does not export Client");
  }
  // Shape checked above; the SDK's own typings describe a wider client.
  const { Client } = mod as { Client: PubkyClientConstructor };

  if (!options.testnet) {
    return new Client();
  }
  if (typeof Client.testnet !== "function") {
    throw new TransportError(
      "@synonymdev/pubky Client does not support testnet",
    );
  }
  return Client.testnet();
}
