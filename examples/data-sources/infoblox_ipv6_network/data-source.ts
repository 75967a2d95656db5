import { networkDatasource, networkPropsSchema, networkResultSchema, ZodDatasourceProvider } from "../../../mod.ts";

// utilization and est_available_ip are always -1: the appliance does not report them for IPv6.
new ZodDatasourceProvider(networkPropsSchema, networkResultSchema, networkDatasource("ipv6"));
