/** Search parameters for a WAPI object query. */
export interface QueryParams {
  /** Ask a grid member to proxy the search to the Grid Master. */
  forceProxy: boolean;
  searchFields: Record<string, string>;
}

export function newQueryParams(forceProxy: boolean, searchFields: Record<string, string>): QueryParams {
  return { forceProxy, searchFields };
}

/**
 * Turns a Terraform `filters` map into WAPI search fields. Keys are passed through as is,
 * so extensible attribute searches use the WAPI `*Name` form.
 */
export function filterFromMap(filters: Record<string, string | number | boolean>): Record<string, string> {
  return Object.fromEntries(Object.entries(filters).map(([k, v]) => [k, String(v)]));
}

/**
 * Renders query params as URL search parameters, minus `_return_fields`.
 */
export function toSearchParams(queryParams: QueryParams): Record<string, string> {
  const params: Record<string, string> = { ...queryParams.searchFields };
  if (queryParams.forceProxy) {
    params._proxy_search = "GM";
  }
  return params;
}
