/**
 * Identity helpers. Every account, token and feed is keyed by its
 * checksummed address so that lookups never depend on letter case.
 */

import { ethers } from "ethers";
import { InvalidAddressError, ZeroAddressError } from "./errors";

export const ZERO_ADDRESS = ethers.ZeroAddress;

/**
 * Normalize to the EIP-55 checksum form.
 * @throws InvalidAddressError if the value is not a 20-byte hex address
 */
export function normalizeAddress(value: string, label = "address"): string {
  if (!ethers.isAddress(value)) {
    throw new InvalidAddressError(label, value);
  }
  return ethers.getAddress(value);
}

/** Normalize and reject the zero address */
export function requireNonZeroAddress(value: string, label: string): string {
  const address = normalizeAddress(value, label);
  if (address === ZERO_ADDRESS) {
    throw new ZeroAddressError(label);
  }
  return address;
}
