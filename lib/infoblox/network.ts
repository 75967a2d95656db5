import { IPv4CidrRange } from "ip-num";
import type { ExtAttrs, Ipv4Network, Ipv6Network, NetworkRecord } from "./objects.ts";

export const DEFAULT_NETWORK_VIEW = "default";

/** Placeholder for values the appliance does not report for IPv6 networks. */
export const IPV6_UNSUPPORTED = -1;

/** One entry of a network datasource's `results` list, keyed by Terraform attribute name. */
export interface NetworkResultItem {
  id: string;
  network_view: string;
  cidr?: string;
  comment?: string;
  /** Extensible attributes as a JSON object. */
  ext_attrs: string;
  utilization: number;
  est_available_ip?: number;
}

/**
 * Estimated unused addresses of an IPv4 network: the utilization share of its host
 * addresses (network and broadcast excluded). /31 and /32 networks, and CIDRs that do
 * not parse, have none.
 */
export function calculateAvailableIPv4s(cidr: string, utilization: number): number {
  let prefix: number;
  try {
    prefix = Number(IPv4CidrRange.fromCidr(cidr).cidrPrefix.getValue());
  } catch {
    return 0;
  }

  const totalIPs = Math.max(2 ** (32 - prefix) - 2, 0);
  return Math.floor((utilization / 1000) * totalIPs);
}

/** JSON text of the attributes with keys in sorted order, so repeated reads compare equal. */
export function formatExtAttrs(ea: ExtAttrs): string {
  const sorted = Object.keys(ea).sort().map((name): [string, unknown] => [name, ea[name]]);
  return JSON.stringify(Object.fromEntries(sorted));
}

function flattenCommon(network: NetworkRecord): NetworkResultItem {
  const res: NetworkResultItem = {
    id: network.ref,
    network_view: network.networkView || DEFAULT_NETWORK_VIEW,
    ext_attrs: formatExtAttrs(network.ea),
    utilization: IPV6_UNSUPPORTED,
  };

  if (network.network !== undefined) {
    res.cidr = network.network;
  }

  if (network.comment !== undefined) {
    res.comment = network.comment;
  }

  return res;
}

export function flattenIpv4Network(network: Ipv4Network): NetworkResultItem {
  const res = { ...flattenCommon(network), utilization: network.utilization };
  if (res.cidr !== undefined) {
    res.est_available_ip = calculateAvailableIPv4s(res.cidr, network.utilization);
  }
  return res;
}

export function flattenIpv6Network(network: Ipv6Network): NetworkResultItem {
  const res = flattenCommon(network);
  if (res.cidr !== undefined) {
    res.est_available_ip = IPV6_UNSUPPORTED;
  }
  return res;
}
