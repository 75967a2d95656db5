/**
 * @module
 *
 * Terraform Infoblox network datasources for the JSON-RPC bridge provider.
 *
 * The bridge provider starts a datasource script and talks JSON-RPC 2.0 to it over
 * stdin/stdout. This module provides the provider runtime (JSocket, datasource providers,
 * diagnostics) together with the Infoblox WAPI connector and the IPv4/IPv6 network
 * datasources built on it.
 *
 * ## Quick Start
 *
 * ```ts
 * import {
 *   networkDatasource,
 *   networkPropsSchema,
 *   networkResultSchema,
 *   ZodDatasourceProvider,
 * } from "terraform-infoblox-bridge";
 *
 * new ZodDatasourceProvider(networkPropsSchema, networkResultSchema, networkDatasource("ipv4"));
 * ```
 *
 * The connector is configured from `INFOBLOX_SERVER`, `INFOBLOX_USERNAME`, `INFOBLOX_PASSWORD`,
 * and optionally `PORT`, `WAPI_VERSION`, `SSLMODE` and `CONNECT_TIMEOUT`.
 *
 * ### Custom datasource
 *
 * ```ts
 * import { DatasourceProvider } from "terraform-infoblox-bridge";
 *
 * new DatasourceProvider<{ name: string }, { greeting: string }>({
 *   async read({ name }) {
 *     return { greeting: `Hello ${name}` };
 *   },
 * });
 * ```
 */

// Provider runtime
export { BaseJsonRpcProvider, type BaseJsonRpcProviderOptions, debugLoggingEnabled } from "./lib/providers/base.ts";
export {
  DatasourceProvider,
  type DatasourceProviderMethods,
  ZodDatasourceProvider,
} from "./lib/providers/datasource.ts";
export {
  type Diagnostic,
  type Diagnostics,
  diagnosticsFromError,
  isDiagnostics,
} from "./lib/providers/diagnostics.ts";

// Export JSocket for advanced use cases (e.g., serving custom methods)
export { JSocket } from "./jsocket.ts";
export type { CloseableReadable, JSocketMethod, JSocketMethods, JSocketOptions, JSocketParams, Writeable } from "./jsocket.ts";

// Infoblox
export { type ConnectorConfig, connectorConfigSchema, parseConnectorConfig } from "./lib/infoblox/config.ts";
export { type IBConnector, WapiConnector, type WapiConnectorOptions } from "./lib/infoblox/connector.ts";
export { WapiError } from "./lib/infoblox/errors.ts";
export {
  calculateAvailableIPv4s,
  flattenIpv4Network,
  flattenIpv6Network,
  type NetworkResultItem,
} from "./lib/infoblox/network.ts";
export {
  type NetworkDatasourceOptions,
  type NetworkFamily,
  type NetworkProps,
  type NetworkResult,
  networkDatasource,
  networkPropsSchema,
  networkResultSchema,
} from "./lib/infoblox/network_datasource.ts";
export {
  type IBObject,
  type Ipv4Network,
  ipv4NetworkObject,
  type Ipv6Network,
  ipv6NetworkObject,
} from "./lib/infoblox/objects.ts";
export { filterFromMap, newQueryParams, type QueryParams } from "./lib/infoblox/query_params.ts";
