/**
 * Analysis failure taxonomy.
 *
 * Every external call in the analysis pipeline converts its failure into one
 * of these codes before it reaches the service layer.
 */

export type AnalysisErrorCode =
  | "no_images_provided"
  | "api_key_missing"
  | "analysis_timeout"
  | "network_error"
  | "parse_error";

function describe(code: AnalysisErrorCode, detail?: string): string {
  switch (code) {
    case "no_images_provided":
      return "No images provided for analysis";
    case "api_key_missing":
      return "API key not configured";
    case "analysis_timeout":
      return "Analysis timed out";
    case "network_error":
      return `Network error: ${detail ?? "unknown"}`;
    case "parse_error":
      return `Parse error: ${detail ?? "unknown"}`;
  }
}

export class AnalysisError extends Error {
  readonly code: AnalysisErrorCode;
  readonly detail: string | null;

  constructor(code: AnalysisErrorCode, detail?: string) {
    super(describe(code, detail));
    this.name = "AnalysisError";
    this.code = code;
    this.detail = detail ?? null;
  }

  static noImages(): AnalysisError {
    return new AnalysisError("no_images_provided");
  }

  static apiKeyMissing(): AnalysisError {
    return new AnalysisError("api_key_missing");
  }

  static timeout(): AnalysisError {
    return new AnalysisError("analysis_timeout");
  }

  static network(detail: string): AnalysisError {
    return new AnalysisError("network_error", detail);
  }

  static parse(detail: string): AnalysisError {
    return new AnalysisError("parse_error", detail);
  }
}

export function isAnalysisError(value: unknown): value is AnalysisError {
  return value instanceof AnalysisError;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === "AbortError" || error.name === "TimeoutError");
}

/**
 * Normalize anything thrown by fetch/JSON/sharp into an AnalysisError.
 * AbortError means our own timeout fired; fetch transport failures surface as TypeError.
 */
export function toAnalysisError(error: unknown): AnalysisError {
  if (isAnalysisError(error)) return error;
  if (error instanceof Error) {
    if (isAbortError(error)) {
      return AnalysisError.timeout();
    }
    if (error instanceof SyntaxError) {
      return AnalysisError.parse(error.message);
    }
    return AnalysisError.network(error.message);
  }
  return AnalysisError.network(String(error));
}
