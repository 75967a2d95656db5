import { z } from "zod";
import { debugLoggingEnabled } from "../providers/base.ts";
import type { DatasourceProviderMethods } from "../providers/datasource.ts";
import { type Diagnostic, type Diagnostics, diagnosticsFromError, isDiagnostics } from "../providers/diagnostics.ts";
import { CONFIG_ENV_VARS, parseConnectorConfig } from "./config.ts";
import { type IBConnector, WapiConnector } from "./connector.ts";
import { flattenIpv4Network, flattenIpv6Network, type NetworkResultItem } from "./network.ts";
import { type IBObject, ipv4NetworkObject, ipv4NetworkSchema, ipv6NetworkObject, ipv6NetworkSchema } from "./objects.ts";
import { filterFromMap, newQueryParams } from "./query_params.ts";

export const networkPropsSchema = z.object({
  filters: z.record(z.string(), z.union([z.string(), z.number(), z.boolean()])),
});

export type NetworkProps = z.infer<typeof networkPropsSchema>;

export const networkResultItemSchema = z.object({
  id: z.string(),
  network_view: z.string(),
  cidr: z.string().optional(),
  comment: z.string().optional(),
  ext_attrs: z.string(),
  utilization: z.number().int(),
  est_available_ip: z.number().int().optional(),
});

export const networkResultSchema = z.object({
  /** Read timestamp; the results have no natural key. */
  id: z.string(),
  results: z.array(networkResultItemSchema),
});

export interface NetworkResult {
  id: string;
  results: NetworkResultItem[];
}

export type NetworkFamily = "ipv4" | "ipv6";

interface NetworkFamilyDef {
  object: IBObject;
  flatten(record: unknown): NetworkResultItem;
}

const families: Record<NetworkFamily, NetworkFamilyDef> = {
  ipv4: {
    object: ipv4NetworkObject,
    flatten: (record) => flattenIpv4Network(ipv4NetworkSchema.parse(record)),
  },
  ipv6: {
    object: ipv6NetworkObject,
    flatten: (record) => flattenIpv6Network(ipv6NetworkSchema.parse(record)),
  },
};

export interface NetworkDatasourceOptions {
  /** Defaults to a {@link WapiConnector} configured from the environment on each read. */
  connector?: IBConnector;

  /** Milliseconds since the epoch; defaults to `Date.now`. */
  clock?: () => number;

  env?: NodeJS.ProcessEnv;
}

const envVars: Partial<Record<string, string>> = CONFIG_ENV_VARS;

function connectorFromEnv(env: NodeJS.ProcessEnv): IBConnector | Diagnostics {
  const config = parseConnectorConfig(env);
  if (!config.success) {
    return {
      diagnostics: config.error.issues.map((i): Diagnostic => {
        const field = String(i.path[0]);
        return {
          severity: "error",
          summary: "Provider Configuration Issue",
          detail: `${envVars[field] ?? field}: ${i.message}`,
        };
      }),
    };
  }
  return new WapiConnector(config.data, { debugLogging: debugLoggingEnabled(env) });
}

/**
 * Builds the read method of the IPv4 or IPv6 network datasource: looks up networks matching
 * the `filters` map and flattens each one into a {@link NetworkResultItem}.
 */
export function networkDatasource(
  family: NetworkFamily,
  options: NetworkDatasourceOptions = {},
): DatasourceProviderMethods<NetworkProps, NetworkResult> {
  const def = families[family];
  const clock = options.clock ?? Date.now;

  return {
    async read({ filters }) {
      const connector = options.connector ?? connectorFromEnv(options.env ?? process.env);
      if (isDiagnostics(connector)) return connector;

      let records: unknown;
      try {
        records = await connector.getObject(def.object, "", newQueryParams(false, filterFromMap(filters)));
      } catch (e) {
        return diagnosticsFromError("getting network failed", e);
      }

      if (records === null || records === undefined) {
        return diagnosticsFromError("getting network failed", "API returns a nil/empty ID for the network");
      }
      if (!Array.isArray(records)) {
        return diagnosticsFromError("getting network failed", `expected a list of ${def.object.objectType} objects`);
      }

      const results: NetworkResultItem[] = [];
      for (const record of records) {
        try {
          results.push(def.flatten(record));
        } catch (e) {
          return diagnosticsFromError("failed to flatten network", e);
        }
      }

      return {
        id: String(Math.floor(clock() / 1000)),
        results,
      };
    },
  };
}
