import * as https from "node:https";
import axios, { type AxiosAdapter, type AxiosInstance } from "axios";
import type { ConnectorConfig } from "./config.ts";
import { WapiError } from "./errors.ts";
import type { IBObject } from "./objects.ts";
import { type QueryParams, toSearchParams } from "./query_params.ts";

/**
 * The slice of the WAPI used by the datasources.
 */
export interface IBConnector {
  /**
   * Fetches objects of `obj.objectType` matching `queryParams`, or the single object
   * behind `ref` when one is given. Resolves to the decoded response body.
   */
  getObject(obj: IBObject, ref: string, queryParams: QueryParams): Promise<unknown>;
}

export interface WapiConnectorOptions {
  debugLogging?: boolean;

  /** Replaces the HTTP transport; the in-process stand-in used by tests. */
  adapter?: AxiosAdapter;
}

interface WapiErrorBody {
  Error?: string;
  code?: string;
  text?: string;
}

function isWapiErrorBody(data: unknown): data is WapiErrorBody {
  return typeof data === "object" && data !== null && ("text" in data || "Error" in data);
}

export class WapiConnector implements IBConnector {
  readonly #http: AxiosInstance;

  constructor(
    readonly config: ConnectorConfig,
    readonly options: WapiConnectorOptions = {},
  ) {
    this.#http = axios.create({
      baseURL: `https://${config.server}:${config.port}/wapi/v${config.wapiVersion}/`,
      timeout: config.requestTimeoutSec * 1000,
      auth: { username: config.username, password: config.password },
      // certificate checks only with SSLMODE=true
      httpsAgent: new https.Agent({ rejectUnauthorized: config.sslVerify }),
      headers: { Accept: "application/json" },
      adapter: options.adapter,
    });
  }

  async getObject(obj: IBObject, ref: string, queryParams: QueryParams): Promise<unknown> {
    const path = ref !== "" ? ref : obj.objectType;
    const params = {
      ...toSearchParams(queryParams),
      _return_fields: obj.returnFields.join(","),
    };

    this.#log(`GET ${path} ${JSON.stringify(params)}`);

    try {
      const response = await this.#http.get<unknown>(path, { params });
      return response.data;
    } catch (error) {
      throw this.#normalizeError(error);
    }
  }

  #log(msg: string) {
    if (this.options.debugLogging) {
      console.error(`[wapi] ${msg}`);
    }
  }

  #normalizeError(error: unknown): WapiError {
    if (axios.isAxiosError(error)) {
      if (error.response) {
        const { status, statusText, data } = error.response;
        if (isWapiErrorBody(data)) {
          return new WapiError(data.text ?? data.Error ?? statusText, status, data.code);
        }
        return new WapiError(typeof data === "string" && data !== "" ? data : statusText, status);
      }

      return new WapiError(`unable to reach Infoblox server ${this.config.server}: ${error.message}`);
    }

    return new WapiError(error instanceof Error ? error.message : String(error));
  }
}
