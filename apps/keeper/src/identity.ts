/**
 * identity.ts
 *
 * Engine accounts are Stacks principals. The keeper liquidates from the
 * address derived from its own private key.
 */

import { getAddressFromPrivateKey, TransactionVersion } from "@stacks/transactions";
import { config } from "./config";

function getTxVersion(network: string): TransactionVersion {
  return network === "mainnet"
    ? TransactionVersion.Mainnet
    : TransactionVersion.Testnet;
}

/** Stacks address derived from the keeper private key. */
export function getKeeperAddress(
  privateKey: string = config.keeperPrivateKey,
  network: string = config.network
): string {
  if (!privateKey) throw new Error("KEEPER_PRIVATE_KEY is not set");
  return getAddressFromPrivateKey(privateKey, getTxVersion(network));
}
