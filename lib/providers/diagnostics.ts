export interface Diagnostic {
  /** Severity indicates the diagnostic level ("error" or "warning") */
  severity: "error" | "warning";

  /** Summary is a short description of the diagnostic */
  summary: string;

  /** Detail provides additional context about the diagnostic */
  detail: string;

  /** PropPath optionally specifies which property the diagnostic relates to */
  propPath?: string[];
}

/** Diagnostics contains any warnings or errors to display to the user. */
export interface Diagnostics {
  diagnostics?: Diagnostic[];
}

export function isDiagnostics(value: unknown): value is Diagnostics {
  return typeof value === "object" && value !== null && "diagnostics" in value;
}

/**
 * Wraps a caught error into a single error diagnostic, the equivalent of failing the
 * whole operation with that error.
 */
export function diagnosticsFromError(summary: string, error: unknown): Diagnostics {
  return {
    diagnostics: [{
      severity: "error",
      summary,
      detail: error instanceof Error ? error.message : String(error),
    }],
  };
}
