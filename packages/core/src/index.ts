export {
  createLogger,
  isLogLevel,
  LOG_LEVEL_NAMES,
  type Logger,
  type LogLevel,
  type LogLevelConfig,
} from "./logger/logger";
export {
  getKnownContacts,
  getPaymentEndpoint,
  getPaymentList,
  labelTransportError,
  removePaymentEndpoint,
  setPaymentEndpoint,
} from "./operations";
export {
  InvalidMethodIdError,
  InvalidPublicKeyError,
  PaykitError,
  StorageRequestError,
  TransportError,
  UnimplementedError,
} from "./shared/domain-error";
export {
  type EndpointData,
  isMethodId,
  type MethodId,
  type SupportedPayments,
  supportedPaymentsToRecord,
  toMethodId,
} from "./shared/payment-types";
export { PublicKey } from "./shared/public-key.vo";
export type {
  AuthenticatedTransport,
  TransportRead,
} from "./shared/transport";
export { MemoryStorage } from "./storage/memory-storage";
export {
  addressPath,
  contactAddress,
  contactPath,
  contactsListAddress,
  FOLLOWS_PATH,
  isDirectoryPath,
  ownerRoot,
  PAYKIT_PATH_PREFIX,
  PUBKY_SCHEME,
  paymentEndpointAddress,
  paymentEndpointPath,
  paymentListAddress,
  trailingSegment,
} from "./storage/paths";
export {
  collectKnownContacts,
  collectSupportedPayments,
  fetchText,
  listEntries,
  type ResolvedEntry,
  type ResolveOptions,
  resolveEntries,
} from "./storage/resolution";
export {
  describeError,
  isNotFound,
  type ListOptions,
  type PublicStorage,
  type SessionStorage,
  type StorageEntry,
} from "./storage/storage";
export {
  addContact,
  removeContact,
  StorageAuthenticatedTransport,
  StorageTransportRead,
  type StorageTransportOptions,
} from "./storage/storage-transport";
