import type { z } from "zod";
import { BaseJsonRpcProvider, type BaseJsonRpcProviderOptions } from "./base.ts";
import { type Diagnostic, type Diagnostics, isDiagnostics } from "./diagnostics.ts";

/**
 * Defines the methods that must be implemented by a datasource provider.
 * Datasources are read-only resources that fetch data from external sources.
 *
 * @template TProps - The type of the properties/configuration for the datasource.
 * @template TResult - The type of the data returned by the datasource.
 */
export interface DatasourceProviderMethods<TProps, TResult> {
  /**
   * Reads data from the datasource based on the provided properties.
   *
   * @param props - The properties/configuration for the datasource read operation.
   * @returns A promise that resolves to the data fetched from the datasource, or diagnostics
   *          describing why it could not be read.
   */
  read(props: TProps): Promise<Diagnostics | TResult>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Base class for implementing Terraform datasource providers with JSON-RPC communication.
 * Datasources are read-only and used to fetch data from external sources during Terraform operations.
 *
 * Values nested under a top-level `sensitive` key of the result are reported separately so the
 * host can hide them from CLI output.
 *
 * @template TProps - The type of the properties/configuration for the datasource.
 * @template TResult - The type of the data returned by the datasource.
 */
export class DatasourceProvider<TProps, TResult> extends BaseJsonRpcProvider {
  /**
   * Creates a new DatasourceProvider instance.
   * @param providerMethods - The implementation of the datasource provider methods.
   * @param options - Streams and logging overrides.
   */
  constructor(providerMethods: DatasourceProviderMethods<TProps, TResult>, options?: BaseJsonRpcProviderOptions) {
    super({
      async read(params) {
        // props are checked by the host against the datasource schema
        const result = await providerMethods.read(params?.props as TProps);
        if (isDiagnostics(result)) return result;

        if (isRecord(result) && "sensitive" in result) {
          const { sensitive: sensitiveResult, ...resultData } = result;
          return { result: resultData, sensitiveResult };
        }

        return { result };
      },
    }, options);
  }
}

function zodDiagnostics(root: "props" | "result", issues: z.ZodIssue[]): Diagnostics {
  return {
    diagnostics: issues.map((i): Diagnostic => ({
      severity: "error",
      summary: "Zod Validation Issue",
      detail: i.message,
      propPath: i.path.length > 0 ? [root, ...i.path.map((_) => String(_))] : undefined,
    })),
  };
}

/**
 * Datasource provider with built-in Zod schema validation for both properties and results.
 * Automatically validates incoming properties and outgoing results against the provided Zod schemas.
 *
 * @template TProps - A Zod schema type that defines the shape of the datasource properties.
 * @template TResult - A Zod schema type that defines the shape of the datasource result.
 */
export class ZodDatasourceProvider<TProps extends z.ZodTypeAny, TResult extends z.ZodTypeAny>
  extends DatasourceProvider<unknown, z.infer<TResult>> {
  /**
   * Creates a new ZodDatasourceProvider instance with schema validation.
   *
   * @param propsSchema - The Zod schema used to validate datasource properties.
   * @param resultSchema - The Zod schema used to validate datasource results.
   * @param providerMethods - The implementation of the datasource provider methods.
   * @param options - Streams and logging overrides.
   */
  constructor(
    propsSchema: TProps,
    resultSchema: TResult,
    providerMethods: DatasourceProviderMethods<z.infer<TProps>, z.infer<TResult>>,
    options?: BaseJsonRpcProviderOptions,
  ) {
    super({
      async read(props) {
        const propsParsed = propsSchema.safeParse(props);
        if (!propsParsed.success) {
          return zodDiagnostics("props", propsParsed.error.issues);
        }

        const result = await providerMethods.read(propsParsed.data);

        // Catch any diagnostics and return them early
        if (isDiagnostics(result)) return result;

        const resultParsed = resultSchema.safeParse(result);
        if (!resultParsed.success) {
          return zodDiagnostics("result", resultParsed.error.issues);
        }

        return resultParsed.data;
      },
    }, options);
  }
}
