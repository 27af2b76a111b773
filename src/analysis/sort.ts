import { isIPv4, isIPv6 } from "node:net";
import { extractSubnet } from "../fusion/index.js";
import type { SubnetSummary } from "../types.js";

interface IpSortKey {
  family: number;
  value: bigint;
  raw: string;
}

function ipv4ToBigInt(ip: string): bigint {
  return ip.split(".").reduce((acc, octet) => (acc << 8n) + BigInt(Number(octet)), 0n);
}

function ipv6ToBigInt(ip: string): bigint {
  let address = ip.split("%")[0];

  // Trailing dotted quad, e.g. ::ffff:10.0.0.1
  const lastColon = address.lastIndexOf(":");
  const tail = address.slice(lastColon + 1);
  if (isIPv4(tail)) {
    const v4 = ipv4ToBigInt(tail);
    address = `${address.slice(0, lastColon + 1)}${(v4 >> 16n).toString(16)}:${(v4 & 0xffffn).toString(16)}`;
  }

  const [head, rest] = address.split("::");
  const headGroups = head ? head.split(":") : [];
  const restGroups = rest ? rest.split(":") : [];
  const missing = rest === undefined ? 0 : 8 - headGroups.length - restGroups.length;
  const groups = [...headGroups, ...Array<string>(missing).fill("0"), ...restGroups];

  return groups.reduce((acc, group) => (acc << 16n) + BigInt(Number.parseInt(group || "0", 16)), 0n);
}

export function ipSortKey(ip: string): IpSortKey {
  if (isIPv4(ip)) return { family: 4, value: ipv4ToBigInt(ip), raw: ip };
  if (isIPv6(ip)) return { family: 6, value: ipv6ToBigInt(ip), raw: ip };
  return { family: 99, value: 0n, raw: ip };
}

/** IPv4 before IPv6, numeric within a family; anything unparseable last. */
export function compareIps(a: string, b: string): number {
  const ka = ipSortKey(a);
  const kb = ipSortKey(b);
  if (ka.family !== kb.family) return ka.family - kb.family;
  if (ka.value !== kb.value) return ka.value < kb.value ? -1 : 1;
  return ka.raw < kb.raw ? -1 : ka.raw > kb.raw ? 1 : 0;
}

export function sortByIp<T extends { ip: string }>(items: readonly T[]): T[] {
  return [...items].sort((a, b) => compareIps(a.ip, b.ip));
}

export interface SubnetGroup<T> {
  subnet: string;
  hosts: T[];
}

// Groups are ordered by their lowest address so 10.0.2.0/24 precedes 10.0.10.0/24
export function groupBySubnet<T extends { ip: string; subnet?: string }>(hosts: readonly T[]): SubnetGroup<T>[] {
  const groups = new Map<string, T[]>();
  for (const host of hosts) {
    const subnet = host.subnet || extractSubnet(host.ip);
    const list = groups.get(subnet);
    if (list) {
      list.push(host);
    } else {
      groups.set(subnet, [host]);
    }
  }

  return [...groups.entries()]
    .map(([subnet, members]) => ({ subnet, hosts: sortByIp(members) }))
    .sort((a, b) => compareIps(a.hosts[0].ip, b.hosts[0].ip) || (a.subnet < b.subnet ? -1 : 1));
}

export function sortHostsBySubnet<T extends { ip: string; subnet?: string }>(hosts: readonly T[]): T[] {
  return groupBySubnet(hosts).flatMap((group) => group.hosts);
}

export function subnetSummary<T extends { ip: string; subnet?: string }>(hosts: readonly T[]): SubnetSummary[] {
  return groupBySubnet(hosts).map((group) => ({
    subnet: group.subnet,
    host_count: group.hosts.length,
    ip_range: `${group.hosts[0].ip} - ${group.hosts[group.hosts.length - 1].ip}`,
  }));
}
