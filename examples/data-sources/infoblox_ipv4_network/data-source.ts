import { networkDatasource, networkPropsSchema, networkResultSchema, ZodDatasourceProvider } from "../../../mod.ts";

// The bridge provider runs this script with tsx and passes props such as
//
//   props = { filters = { network_view = "default", "*Site" = "HQ" } }
//
// Each entry of result.results carries id, network_view, cidr, comment, ext_attrs,
// utilization and est_available_ip.
new ZodDatasourceProvider(networkPropsSchema, networkResultSchema, networkDatasource("ipv4"));
