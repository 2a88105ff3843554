import { createLogger, type Logger } from "../logger/logger";
import { TransportError } from "../shared/domain-error";
import type {
  EndpointData,
  MethodId,
  SupportedPayments,
} from "../shared/payment-types";
import type { PublicKey } from "../shared/public-key.vo";
import type {
  AuthenticatedTransport,
  TransportRead,
} from "../shared/transport";
import {
  contactPath,
  paymentEndpointAddress,
  paymentEndpointPath,
} from "./paths";
import {
  collectKnownContacts,
  collectSupportedPayments,
  fetchText,
  type ResolveOptions,
} from "./resolution";
import { describeError, type PublicStorage, type SessionStorage } from "./storage";

export interface StorageTransportOptions {
  readonly logger?: Logger;
  /** Default 1: endpoint documents are fetched one after another. */
  readonly fetchConcurrency?: number;
}

const DEFAULT_FETCH_CONCURRENCY = 1;

/** `TransportRead` over any `PublicStorage` that follows the Paykit layout. */
export class StorageTransportRead implements TransportRead {
  private readonly options: ResolveOptions;

  constructor(
    private readonly storage: PublicStorage,
    options: StorageTransportOptions = {},
  ) {
    this.options = {
      logger: options.logger ?? createLogger("warn"),
      fetchConcurrency: options.fetchConcurrency ?? DEFAULT_FETCH_CONCURRENCY,
    };
  }

  fetchSupportedPayments(payee: PublicKey): Promise<SupportedPayments> {
    return collectSupportedPayments(this.storage, payee, this.options);
  }

  fetchPaymentEndpoint(
    payee: PublicKey,
    method: MethodId,
  ): Promise<EndpointData | undefined> {
    return fetchText(
      this.storage,
      paymentEndpointAddress(payee, method),
      "fetch endpoint",
    );
  }

  fetchKnownContacts(owner: PublicKey): Promise<PublicKey[]> {
    return collectKnownContacts(this.storage, owner, this.options);
  }
}

/** `AuthenticatedTransport` writing into the session owner's storage. */
export class StorageAuthenticatedTransport implements AuthenticatedTransport {
  constructor(private readonly session: SessionStorage) {}

  get owner(): PublicKey {
    return this.session.owner;
  }

  async upsertPaymentEndpoint(
    method: MethodId,
    data: EndpointData,
  ): Promise<void> {
    try {
      await this.session.put(paymentEndpointPath(method), data);
    } catch (err) {
      throw new TransportError(`put endpoint: ${describeError(err)}`, {
        cause: err,
      });
    }
  }

  async removePaymentEndpoint(method: MethodId): Promise<void> {
    try {
      await this.session.delete(paymentEndpointPath(method));
    } catch (err) {
      throw new TransportError(`delete endpoint: ${describeError(err)}`, {
        cause: err,
      });
    }
  }
}

/** Writes the empty follow marker that makes `contact` a known contact. */
export async function addContact(
  session: SessionStorage,
  contact: PublicKey,
): Promise<void> {
  try {
    await session.put(contactPath(contact), "");
  } catch (err) {
    throw new TransportError(`put contact: ${describeError(err)}`, {
      cause: err,
    });
  }
}

export async function removeContact(
  session: SessionStorage,
  contact: PublicKey,
): Promise<void> {
  try {
    await session.delete(contactPath(contact));
  } catch (err) {
    throw new TransportError(`delete contact: ${describeError(err)}`, {
      cause: err,
    });
  }
}
