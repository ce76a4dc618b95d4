import { describe, it, expect } from "vitest";
import { AnalysisError, isAbortError, isAnalysisError, toAnalysisError } from "@/lib/errors/analysisError";

describe("AnalysisError", () => {
  it("carries a user-facing message per code", () => {
    expect(AnalysisError.noImages().message).toBe("No images provided for analysis");
    expect(AnalysisError.apiKeyMissing().message).toBe("API key not configured");
    expect(AnalysisError.timeout().message).toBe("Analysis timed out");
    expect(AnalysisError.network("socket hang up").message).toBe("Network error: socket hang up");
    expect(AnalysisError.parse("bad json").message).toBe("Parse error: bad json");
  });

  it("keeps the detail separately", () => {
    const error = AnalysisError.network("ECONNRESET");
    expect(error.code).toBe("network_error");
    expect(error.detail).toBe("ECONNRESET");
    expect(AnalysisError.timeout().detail).toBeNull();
    expect(isAnalysisError(error)).toBe(true);
    expect(isAnalysisError(new Error("x"))).toBe(false);
  });
});

describe("toAnalysisError", () => {
  it("returns analysis errors unchanged", () => {
    const error = AnalysisError.parse("x");
    expect(toAnalysisError(error)).toBe(error);
  });

  it("maps aborts and timeouts", () => {
    const abort = new Error("aborted");
    abort.name = "AbortError";
    const timeout = new Error("timed out");
    timeout.name = "TimeoutError";

    expect(toAnalysisError(abort).code).toBe("analysis_timeout");
    expect(toAnalysisError(timeout).code).toBe("analysis_timeout");
  });

  it("recognizes DOMException aborts", () => {
    const abort = new DOMException("This operation was aborted", "AbortError");

    expect(isAbortError(abort)).toBe(true);
    expect(isAbortError(new TypeError("fetch failed"))).toBe(false);
    expect(toAnalysisError(abort).message).toBe("Analysis timed out");
  });

  it("maps JSON syntax errors to parse errors", () => {
    let thrown: unknown;
    try {
      JSON.parse("{");
    } catch (error) {
      thrown = error;
    }
    expect(toAnalysisError(thrown).code).toBe("parse_error");
  });

  it("maps everything else to network errors", () => {
    expect(toAnalysisError(new TypeError("fetch failed")).message).toBe("Network error: fetch failed");
    expect(toAnalysisError("boom").message).toBe("Network error: boom");
  });
});
