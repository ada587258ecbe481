import { isIP } from "node:net";

/**
 * Check CIDR notation ("10.0.0.0/24", "fd00::/64"). A bare address counts
 * as a single-host network.
 */
export function isValidCidr(value: string): boolean {
  const [address, prefix, ...rest] = value.trim().split("/");
  if (address === undefined || rest.length > 0) {
    return false;
  }

  const version = isIP(address);
  if (version === 0) {
    return false;
  }
  if (prefix === undefined) {
    return true;
  }
  if (!/^\d{1,3}$/.test(prefix)) {
    return false;
  }

  return Number(prefix) <= (version === 4 ? 32 : 128);
}
