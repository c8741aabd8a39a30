import type { Address } from "./address.js";
import { InvalidArgumentError } from "./errors.js";

export type NetworkConfig = {
  networkId: string;
  /** Leading address byte; fixes the first base32 character of every address. */
  addressVersion: number;
};

export const MAINNET: NetworkConfig = {
  networkId: "mainnet",
  addressVersion: 0x68,
};

export const TESTNET: NetworkConfig = {
  networkId: "testnet",
  addressVersion: 0x98,
};

const PRESETS: readonly NetworkConfig[] = [MAINNET, TESTNET];

/**
 * Picks a preset from `HARVESTKIT_NETWORK` ("mainnet" | "testnet").
 * Unset means testnet.
 */
export function resolveNetworkConfig(
  env: Record<string, string | undefined> = process.env,
): NetworkConfig {
  const name = env.HARVESTKIT_NETWORK?.trim().toLowerCase();
  if (!name) return TESTNET;
  const preset = PRESETS.find((n) => n.networkId === name);
  if (!preset) throw new InvalidArgumentError(`Unknown network: ${JSON.stringify(name)}`);
  return preset;
}

export function networkForAddress(address: Address): NetworkConfig | undefined {
  const version = address.version();
  return PRESETS.find((n) => n.addressVersion === version);
}
