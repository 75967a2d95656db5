/**
 * Raised for any failed WAPI call. `status` is the HTTP status when the appliance answered,
 * `code` the WAPI error code from the response body (e.g. "Client.Ibap.Proto").
 */
export class WapiError extends Error {
  override readonly name = "WapiError";

  constructor(
    message: string,
    readonly status?: number,
    readonly code?: string,
  ) {
    super(message);
  }
}
