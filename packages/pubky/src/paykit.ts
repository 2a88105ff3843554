import {
  type AuthenticatedTransport,
  createLogger,
  type EndpointData,
  getKnownContacts,
  getPaymentEndpoint,
  getPaymentList,
  type Logger,
  type MethodId,
  PublicKey,
  removePaymentEndpoint,
  StorageAuthenticatedTransport,
  StorageTransportRead,
  type SupportedPayments,
  setPaymentEndpoint,
  type TransportRead,
} from "@paykit/core";
import { loadPubkyClient, type PubkyClientLike } from "./adapter/pubky-client";
import {
  PubkyPublicStorage,
  PubkySessionStorage,
} from "./adapter/pubky-storage";
import { validateConfig } from "./config/schema";
import type { PaykitConfig, ValidatedConfig } from "./config/types";
import { ConfigurationError } from "./errors/configuration-error";

export interface PaykitDependencies {
  /**
   * Pre-built SDK client. Pass a signed-in client to publish endpoints;
   * otherwise a fresh unauthenticated client is created on first use.
   */
  readonly client?: PubkyClientLike;
}

/**
 * Publishes and discovers payment endpoints on Pubky storage.
 *
 * @example
 * ```ts
 * const paykit = new Paykit({ logLevel: "info" });
 * const payments = await paykit.getPaymentList(payeeKey);
 * const lightning = await paykit.getPaymentEndpoint(payeeKey, "lightning");
 * ```
 */
export class Paykit {
  private readonly config: ValidatedConfig;
  private readonly logger: Logger;
  private readonly sessionOwner: PublicKey | undefined;
  private client: Promise<PubkyClientLike> | undefined;

  constructor(config: PaykitConfig = {}, deps: PaykitDependencies = {}) {
    this.config = validateConfig(config);
    this.logger = createLogger(this.config.logLevel);
    this.sessionOwner =
      this.config.sessionPublicKey !== undefined
        ? PublicKey.parse(this.config.sessionPublicKey)
        : undefined;
    this.client = deps.client ? Promise.resolve(deps.client) : undefined;
  }

  /** Read side, shared by every lookup. */
  async reader(): Promise<TransportRead> {
    const client = await this.getClient();
    return new StorageTransportRead(new PubkyPublicStorage(client), {
      logger: this.logger.child("storage"),
      fetchConcurrency: this.config.fetchConcurrency,
    });
  }

  /** @throws ConfigurationError when no `sessionPublicKey` is configured. */
  async writer(): Promise<AuthenticatedTransport> {
    const owner = this.sessionOwner;
    if (!owner) {
      throw new ConfigurationError(
        "missing_session",
        "Publishing endpoints requires sessionPublicKey and a signed-in Pubky client.",
      );
    }
    const client = await this.getClient();
    return new StorageAuthenticatedTransport(
      new PubkySessionStorage(client, owner),
    );
  }

  async getPaymentList(payee: PublicKey | string): Promise<SupportedPayments> {
    const key = PublicKey.from(payee);
    const payments = await getPaymentList(await this.reader(), key);
    this.logger.info(`Found ${payments.size} payment endpoint(s) for ${key}`);
    return payments;
  }

  async getPaymentEndpoint(
    payee: PublicKey | string,
    method: MethodId,
  ): Promise<EndpointData | undefined> {
    const key = PublicKey.from(payee);
    return getPaymentEndpoint(await this.reader(), key, method);
  }

  async getKnownContacts(owner: PublicKey | string): Promise<PublicKey[]> {
    const key = PublicKey.from(owner);
    return getKnownContacts(await this.reader(), key);
  }

  async setPaymentEndpoint(method: MethodId, data: EndpointData): Promise<void> {
    await setPaymentEndpoint(await this.writer(), method, data);
    this.logger.info(`Published payment endpoint "${method}"`);
  }

  async removePaymentEndpoint(method: MethodId): Promise<void> {
    await removePaymentEndpoint(await this.writer(), method);
    this.logger.info(`Removed payment endpoint "${method}"`);
  }

  // Concurrent first calls share the pending load.
  private getClient(): Promise<PubkyClientLike> {
    if (!this.client) {
      this.logger.debug(
        `Loading Pubky client (${this.config.testnet ? "testnet" : "mainnet"})`,
      );
      this.client = loadPubkyClient({ testnet: this.config.testnet }).catch(
        (err: unknown) => {
          this.client = undefined;
          throw err;
        },
      );
    }
    return this.client;
  }
}
