import type { EndpointData, MethodId, SupportedPayments } from "./payment-types";
import type { PublicKey } from "./public-key.vo";

/** Read-only access to published Paykit data. Needs no session. */
export interface TransportRead {
  /** All endpoints `payee` publishes. Empty when nothing was ever published. */
  fetchSupportedPayments(payee: PublicKey): Promise<SupportedPayments>;
  /** One endpoint document, or `undefined` when it is missing or empty. */
  fetchPaymentEndpoint(
    payee: PublicKey,
    method: MethodId,
  ): Promise<EndpointData | undefined>;
  /** Keys `owner` follows. Rejects when a listed entry is not a public key. */
  fetchKnownContacts(owner: PublicKey): Promise<PublicKey[]>;
}

/** Write access to the signed-in identity's own endpoints. */
export interface AuthenticatedTransport {
  /** Creates or replaces the endpoint document for `method`. */
  upsertPaymentEndpoint(method: MethodId, data: EndpointData): Promise<void>;
  /** Deletes the endpoint document. Rejects when there is nothing to delete. */
  removePaymentEndpoint(method: MethodId): Promise<void>;
}
