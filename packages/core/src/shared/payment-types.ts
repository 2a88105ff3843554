import { InvalidMethodIdError } from "./domain-error";

/**
 * Name of a payment method ("lightning", "onchain", ...). Stored as the last
 * segment of the endpoint path, so it never contains a "/".
 */
type MethodId = string & {};

/**
 * Serialized endpoint descriptor (JSON, lnurl, bolt11, ...). Opaque UTF-8 text;
 * binary payloads must be encoded (e.g. base64) by the caller.
 */
type EndpointData = string & {};

/** Every method a payee currently publishes, keyed by method id. */
type SupportedPayments = ReadonlyMap<MethodId, EndpointData>;

function isMethodId(value: string): value is MethodId {
  return value.length > 0 && !value.includes("/");
}

/** @throws InvalidMethodIdError if the value is empty or contains "/". */
function toMethodId(value: string): MethodId {
  if (typeof value !== "string" || !isMethodId(value)) {
    throw new InvalidMethodIdError(String(value));
  }
  return value;
}

function supportedPaymentsToRecord(
  payments: SupportedPayments,
): Record<MethodId, EndpointData> {
  return Object.fromEntries(payments);
}

export {
  type EndpointData,
  isMethodId,
  type MethodId,
  type SupportedPayments,
  supportedPaymentsToRecord,
  toMethodId,
};
