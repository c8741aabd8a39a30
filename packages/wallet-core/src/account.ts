import {
  absent,
  InvalidArgumentError,
  MalformedDataError,
  NodeEndpoint,
  ObjectDeserializer,
  optionalToUndefined,
  PrivateKey,
  serializeToJson,
  type Address,
  type NetworkConfig,
  type ObjectSerializer,
  type Optional,
  type SerializableEntity,
} from "@harvestkit/sdk";
import { createWalletAccountContext, type WalletAccountContext } from "./context.js";

const FIELD_PRIVATE_KEY = "privateKey";
const FIELD_REMOTE_KEY = "remoteHarvestingPrivateKey";
const FIELD_REMOTE_ENDPOINT = "remoteHarvestingEndpoint";

export type WalletAccountInit = {
  primaryKey: PrivateKey | null | undefined;
  /** Raw remote harvesting key; wrapped as-is. */
  remoteKey?: bigint | null;
  remoteEndpoint?: NodeEndpoint;
};

/**
 * An account held in a wallet: its address, the primary key that controls
 * it, and the optional key/node pair used for remote harvesting.
 *
 * Identity is the address alone.
 */
export class WalletAccount implements SerializableEntity {
  private remoteHarvestingKey: PrivateKey | undefined;
  private remoteHarvestingEndpoint: NodeEndpoint | undefined;

  private constructor(
    public readonly address: Address,
    public readonly primaryKey: PrivateKey,
    remoteKey: PrivateKey | undefined,
    private readonly ctx: WalletAccountContext,
  ) {
    this.remoteHarvestingKey = remoteKey;
  }

  /** Creates an account around a freshly generated key pair. */
  static generate(ctx: WalletAccountContext = createWalletAccountContext()): WalletAccount {
    return WalletAccount.fromKey(ctx.keyPairs.generate().privateKey, undefined, ctx);
  }

  static fromKey(
    primaryKey: PrivateKey | null | undefined,
    rawRemoteKey?: bigint | null,
    ctx: WalletAccountContext = createWalletAccountContext(),
  ): WalletAccount {
    if (primaryKey === null || primaryKey === undefined) {
      throw new InvalidArgumentError("wallet account requires private key");
    }

    const keyPair = ctx.keyPairs.fromPrivateKey(primaryKey);
    const address = ctx.addresses.derive(keyPair.publicKey);
    const remoteKey = rawRemoteKey === null || rawRemoteKey === undefined ? undefined : new PrivateKey(rawRemoteKey);
    return new WalletAccount(address, primaryKey, remoteKey, ctx);
  }

  static create(init: WalletAccountInit, ctx: WalletAccountContext = createWalletAccountContext()): WalletAccount {
    const account = WalletAccount.fromKey(init.primaryKey, init.remoteKey, ctx);
    account.setRemoteEndpoint(init.remoteEndpoint);
    return account;
  }

  static deserialize(
    deserializer: ObjectDeserializer,
    ctx: WalletAccountContext = createWalletAccountContext(),
  ): WalletAccount {
    const primaryKey = new PrivateKey(deserializer.readBigInt(FIELD_PRIVATE_KEY));
    const remoteKey = readRemoteKeyLeniently(deserializer, ctx);
    const account = WalletAccount.fromKey(primaryKey, optionalToUndefined(remoteKey), ctx);
    const endpoint = deserializer.readOptionalObject(FIELD_REMOTE_ENDPOINT, NodeEndpoint.deserialize);
    account.setRemoteEndpoint(optionalToUndefined(endpoint));
    return account;
  }

  static fromJson(text: string, ctx: WalletAccountContext = createWalletAccountContext()): WalletAccount {
    return WalletAccount.deserialize(ObjectDeserializer.fromJson(text), ctx);
  }

  get network(): NetworkConfig {
    return this.ctx.network;
  }

  /** The remote harvesting key, if one has been set or generated. Never generates. */
  get remoteKey(): PrivateKey | undefined {
    return this.remoteHarvestingKey;
  }

  /** Returns the remote harvesting key, generating and keeping one on first use. */
  ensureRemoteKey(): PrivateKey {
    if (this.remoteHarvestingKey === undefined) {
      this.remoteHarvestingKey = this.ctx.keyPairs.generate().privateKey;
      this.ctx.logger.debug("Generated remote harvesting key", { address: this.address.toString() });
    }
    return this.remoteHarvestingKey;
  }

  get remoteEndpoint(): NodeEndpoint | undefined {
    return this.remoteHarvestingEndpoint;
  }

  setRemoteEndpoint(endpoint: NodeEndpoint | undefined): void {
    this.remoteHarvestingEndpoint = endpoint;
  }

  serialize(serializer: ObjectSerializer): void {
    serializer.writeBigInt(FIELD_PRIVATE_KEY, this.primaryKey.raw);
    serializer.writeBigInt(FIELD_REMOTE_KEY, this.remoteHarvestingKey?.raw);
    serializer.writeObject(FIELD_REMOTE_ENDPOINT, this.remoteHarvestingEndpoint);
  }

  toJson(): string {
    return serializeToJson(this);
  }

  equals(other: unknown): boolean {
    return other instanceof WalletAccount && this.address.equals(other.address);
  }

  hashCode(): number {
    return this.address.hashCode();
  }

  toString(): string {
    return this.address.toString();
  }
}

// Unparsable remote key material falls back to "not set".
function readRemoteKeyLeniently(deserializer: ObjectDeserializer, ctx: WalletAccountContext): Optional<bigint> {
  try {
    return deserializer.readOptionalBigInt(FIELD_REMOTE_KEY);
  } catch (e) {
    if (!(e instanceof MalformedDataError)) throw e;
    ctx.logger.warn("Ignoring unreadable remote harvesting key", { error: e.message });
    return absent();
  }
}
