import { z } from "zod";

/**
 * Connection settings for the Infoblox appliance, read from the same environment
 * variables the Infoblox Terraform provider honours.
 */
export const connectorConfigSchema = z.object({
  server: z.string().min(1, "INFOBLOX_SERVER must be set"),
  username: z.string().min(1, "INFOBLOX_USERNAME must be set"),
  password: z.string().min(1, "INFOBLOX_PASSWORD must be set"),
  port: z.coerce.number().int().min(1).max(65535).default(443),
  wapiVersion: z.string().min(1).default("2.7"),
  sslVerify: z.boolean().default(false),
  /**
   * Upper bound for a whole WAPI request, connecting included. Read from CONNECT_TIMEOUT,
   * the variable the Infoblox provider uses for it.
   */
  requestTimeoutSec: z.coerce.number().int().positive().default(60),
});

export type ConnectorConfig = z.infer<typeof connectorConfigSchema>;

/** Maps each config field to the environment variable it is read from. */
export const CONFIG_ENV_VARS = {
  server: "INFOBLOX_SERVER",
  username: "INFOBLOX_USERNAME",
  password: "INFOBLOX_PASSWORD",
  port: "PORT",
  wapiVersion: "WAPI_VERSION",
  sslVerify: "SSLMODE",
  requestTimeoutSec: "CONNECT_TIMEOUT",
} as const satisfies Record<keyof ConnectorConfig, string>;

export function parseConnectorConfig(env: NodeJS.ProcessEnv = process.env) {
  const sslmode = env[CONFIG_ENV_VARS.sslVerify];
  return connectorConfigSchema.safeParse({
    server: env[CONFIG_ENV_VARS.server] ?? "",
    username: env[CONFIG_ENV_VARS.username] ?? "",
    password: env[CONFIG_ENV_VARS.password] ?? "",
    port: env[CONFIG_ENV_VARS.port] || undefined,
    wapiVersion: env[CONFIG_ENV_VARS.wapiVersion] || undefined,
    sslVerify: sslmode === undefined ? undefined : sslmode.toLowerCase() === "true",
    requestTimeoutSec: env[CONFIG_ENV_VARS.requestTimeoutSec] || undefined,
  });
}
