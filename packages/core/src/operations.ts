import { PaykitError, TransportError } from "./shared/domain-error";
import {
  type EndpointData,
  type MethodId,
  type SupportedPayments,
  toMethodId,
} from "./shared/payment-types";
import type { PublicKey } from "./shared/public-key.vo";
import type {
  AuthenticatedTransport,
  TransportRead,
} from "./shared/transport";
import { describeError } from "./storage/storage";

type OperationLabel =
  | "get_payment_list"
  | "get_payment_endpoint"
  | "get_known_contacts"
  | "set_payment_endpoint"
  | "remove_payment_endpoint";

/**
 * Prefixes transport failures with the operation that surfaced them.
 * Other Paykit errors keep their kind and message. Anything else a custom
 * transport throws is reported as a transport failure.
 */
export function labelTransportError(label: string, err: unknown): PaykitError {
  if (err instanceof TransportError) {
    return new TransportError(`${label}: ${err.message}`, { cause: err });
  }
  if (err instanceof PaykitError) {
    return err;
  }
  return new TransportError(`${label}: ${describeError(err)}`, { cause: err });
}

async function run<T>(label: OperationLabel, call: () => Promise<T>): Promise<T> {
  try {
    return await call();
  } catch (err) {
    throw labelTransportError(label, err);
  }
}

/**
 * Every endpoint `payee` publishes.
 * Resolves to an empty map when nothing was published.
 *
 * @example
 * ```ts
 * const payments = await getPaymentList(reader, payee);
 * for (const [method, data] of payments) console.log(method, data);
 * ```
 */
export function getPaymentList(
  reader: TransportRead,
  payee: PublicKey,
): Promise<SupportedPayments> {
  return run("get_payment_list", () => reader.fetchSupportedPayments(payee));
}

/** The endpoint `payee` publishes for `method`, or `undefined` when missing or empty. */
export function getPaymentEndpoint(
  reader: TransportRead,
  payee: PublicKey,
  method: MethodId,
): Promise<EndpointData | undefined> {
  return run("get_payment_endpoint", () =>
    reader.fetchPaymentEndpoint(payee, toMethodId(method)),
  );
}

/** Keys `owner` follows. Empty when the follows directory does not exist. */
export function getKnownContacts(
  reader: TransportRead,
  owner: PublicKey,
): Promise<PublicKey[]> {
  return run("get_known_contacts", () => reader.fetchKnownContacts(owner));
}

/** Creates or replaces the signed-in identity's endpoint for `method`. */
export function setPaymentEndpoint(
  writer: AuthenticatedTransport,
  method: MethodId,
  data: EndpointData,
): Promise<void> {
  return run("set_payment_endpoint", () =>
    writer.upsertPaymentEndpoint(toMethodId(method), data),
  );
}

/**
 * Deletes the endpoint for `method`. Rejects when it was never published;
 * check with `getPaymentEndpoint` first if a missing endpoint is fine.
 */
export function removePaymentEndpoint(
  writer: AuthenticatedTransport,
  method: MethodId,
): Promise<void> {
  return run("remove_payment_endpoint", () =>
    writer.removePaymentEndpoint(toMethodId(method)),
  );
}
