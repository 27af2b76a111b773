import { isIPv4, isIPv6 } from "node:net";

export const UNKNOWN_SUBNET = "unknown/24";

export function extractSubnet(ip: string): string {
  if (isIPv4(ip)) {
    return `${ip.split(".").slice(0, 3).join(".")}.0/24`;
  }
  if (isIPv6(ip)) {
    return `${ip.split(":").slice(0, 4).join(":")}::/64`;
  }
  return UNKNOWN_SUBNET;
}
