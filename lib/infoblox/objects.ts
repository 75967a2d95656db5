import { z } from "zod";

/** A WAPI object type together with the fields requested for it. */
export interface IBObject {
  objectType: string;
  returnFields: string[];
}

/** Copy of `obj` with `fields` appended to its return fields, skipping ones already present. */
export function withReturnFields(obj: IBObject, ...fields: string[]): IBObject {
  return {
    ...obj,
    returnFields: [...new Set([...obj.returnFields, ...fields])],
  };
}

export const ipv4NetworkObject: IBObject = withReturnFields(
  { objectType: "network", returnFields: ["network", "network_view", "comment", "utilization"] },
  "extattrs",
);

export const ipv6NetworkObject: IBObject = withReturnFields(
  { objectType: "ipv6network", returnFields: ["network", "network_view", "comment"] },
  "extattrs",
);

/**
 * Extensible attributes arrive as `{ "Site": { "value": "HQ" } }`; only the value is kept.
 */
export const extAttrsSchema = z
  .record(z.string(), z.object({ value: z.unknown() }))
  .transform((ea) => Object.fromEntries(Object.entries(ea).map(([name, { value }]) => [name, value])));

export type ExtAttrs = Record<string, unknown>;

const networkRecordWire = z.object({
  _ref: z.string(),
  network_view: z.string().optional(),
  network: z.string().optional(),
  comment: z.string().optional(),
  extattrs: extAttrsSchema.optional(),
});

/** Fields shared by IPv4 and IPv6 network objects. */
export interface NetworkRecord {
  ref: string;
  networkView?: string;
  network?: string;
  comment?: string;
  ea: ExtAttrs;
}

export type Ipv6Network = NetworkRecord;

export interface Ipv4Network extends NetworkRecord {
  /** Per-mille of addresses in use, 0-1000. */
  utilization: number;
}

function toNetworkRecord(n: z.infer<typeof networkRecordWire>): NetworkRecord {
  return {
    ref: n._ref,
    networkView: n.network_view,
    network: n.network,
    comment: n.comment,
    ea: n.extattrs ?? {},
  };
}

export const ipv6NetworkSchema: z.ZodType<Ipv6Network, z.ZodTypeDef, unknown> = networkRecordWire
  .transform(toNetworkRecord);

export const ipv4NetworkSchema: z.ZodType<Ipv4Network, z.ZodTypeDef, unknown> = networkRecordWire
  .extend({ utilization: z.number().int().min(0).max(1000).optional() })
  .transform((n) => ({ ...toNetworkRecord(n), utilization: n.utilization ?? 0 }));
