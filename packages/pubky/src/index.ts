export type {
  EndpointData,
  LogLevelConfig,
  MethodId,
  SupportedPayments,
} from "@paykit/core";
export {
  InvalidMethodIdError,
  InvalidPublicKeyError,
  isLogLevel,
  LOG_LEVEL_NAMES,
  PaykitError,
  PublicKey,
  supportedPaymentsToRecord,
  TransportError,
} from "@paykit/core";
export {
  type LoadPubkyClientOptions,
  loadPubkyClient,
  type PubkyClientLike,
} from "./adapter/pubky-client";
export {
  PubkyPublicStorage,
  PubkySessionStorage,
  toStorageRequestError,
} from "./adapter/pubky-storage";
export type { PaykitConfig, ValidatedConfig } from "./config/types";
export { ConfigurationError } from "./errors/configuration-error";
export type { PaykitDependencies } from "./paykit";
export { Paykit } from "./paykit";

/** SDK version string, following semver. */
export const VERSION = "0.1.0";
