/**
 * Layout of Paykit data on Pubky storage.
 *
 * - `/pub/paykit.app/v0/{method_id}`: one endpoint document per method
 * - `/pub/pubky.app/follows/{public_key}`: one empty marker per known contact
 *
 * `v0` is the protocol version. An incompatible layout gets a new version
 * segment instead of changing what `v0` means.
 */

import type { MethodId } from "../shared/payment-types";
import type { PublicKey } from "../shared/public-key.vo";

export const PAYKIT_PATH_PREFIX = "/pub/paykit.app/v0/";
export const FOLLOWS_PATH = "/pub/pubky.app/follows/";
export const PUBKY_SCHEME = "pubky://";

export function ownerRoot(owner: PublicKey): string {
  return `${PUBKY_SCHEME}${owner.z32}`;
}

export function paymentEndpointPath(method: MethodId): string {
  return `${PAYKIT_PATH_PREFIX}${method}`;
}

export function paymentEndpointAddress(
  payee: PublicKey,
  method: MethodId,
): string {
  return `${ownerRoot(payee)}${paymentEndpointPath(method)}`;
}

/** Directory listed to discover every endpoint of `payee`. */
export function paymentListAddress(payee: PublicKey): string {
  return `${ownerRoot(payee)}${PAYKIT_PATH_PREFIX}`;
}

export function contactPath(contact: PublicKey): string {
  return `${FOLLOWS_PATH}${contact.z32}`;
}

export function contactAddress(owner: PublicKey, contact: PublicKey): string {
  return `${ownerRoot(owner)}${contactPath(contact)}`;
}

export function contactsListAddress(owner: PublicKey): string {
  return `${ownerRoot(owner)}${FOLLOWS_PATH}`;
}

/** Path part of a `pubky://<key>/<path>` address; "/" when it has none. */
export function addressPath(address: string): string {
  const start = address.startsWith(PUBKY_SCHEME) ? PUBKY_SCHEME.length : 0;
  const pathStart = address.indexOf("/", start);
  return pathStart === -1 ? "/" : address.slice(pathStart);
}

/** Entries ending in "/" are sub-directories, not documents. */
export function isDirectoryPath(path: string): boolean {
  return path.endsWith("/");
}

/** Text after the last "/", or `undefined` when that text is empty. */
export function trailingSegment(path: string): string | undefined {
  const segment = path.slice(path.lastIndexOf("/") + 1);
  return segment.length > 0 ? segment : undefined;
}
