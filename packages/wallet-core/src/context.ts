import {
  ed25519KeyPairs,
  networkAddressDeriver,
  resolveLogger,
  resolveNetworkConfig,
  type AddressDeriver,
  type KeyPairProvider,
  type Logger,
  type NetworkConfig,
} from "@harvestkit/sdk";

export type WalletAccountContext = {
  network: NetworkConfig;
  keyPairs: KeyPairProvider;
  addresses: AddressDeriver;
  logger: Logger;
};

/**
 * Fills in whatever `options` leaves out. Network and logger come from
 * `HARVESTKIT_NETWORK` and `HARVESTKIT_LOG_LEVEL` in `env`.
 */
export function createWalletAccountContext(
  options: Partial<WalletAccountContext> = {},
  env: Record<string, string | undefined> = process.env,
): WalletAccountContext {
  const network = options.network ?? resolveNetworkConfig(env);
  const logger = options.logger ?? resolveLogger(env);
  return {
    network,
    keyPairs: options.keyPairs ?? ed25519KeyPairs,
    addresses: options.addresses ?? networkAddressDeriver(network),
    logger: logger.child ? logger.child({ module: "wallet-account" }) : logger,
  };
}
