import { describe, it, expect, vi, beforeEach } from "vitest";
import type { ResaleConfig } from "@/lib/config/resaleConfig";
import { AnalysisError } from "@/lib/errors/analysisError";
import {
  GoogleVisionTextRecognizer,
  extractAnnotatedText,
  splitRecognizedText,
} from "@/lib/vision/textRecognition";

const config: ResaleConfig = {
  openai_api_key: null,
  openai_model: "gpt-4o",
  openai_endpoint: "https://openai.test/v1/chat/completions",
  google_vision_api_key: "test-key",
  google_vision_endpoint: "https://vision.test/v1/images:annotate",
  supabase_url: null,
  supabase_service_key: null,
  request_timeout_ms: 1000,
};

async function captureError(promise: Promise<unknown>): Promise<AnalysisError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof AnalysisError) return error;
    throw error;
  }
  throw new Error("expected rejection");
}

describe("splitRecognizedText", () => {
  it("trims lines and drops blanks", () => {
    expect(splitRecognizedText("NIKE\r\n  Air Max \n\nUS 10\n")).toEqual(["NIKE", "Air Max", "US 10"]);
  });
});

describe("extractAnnotatedText", () => {
  it("prefers the full text annotation", () => {
    const body = {
      responses: [{ fullTextAnnotation: { text: "ADIDAS\nSAMBA" }, textAnnotations: [{ description: "ignored" }] }],
    };
    expect(extractAnnotatedText(body)).toEqual(["ADIDAS", "SAMBA"]);
  });

  it("falls back to the first text annotation", () => {
    expect(extractAnnotatedText({ responses: [{ textAnnotations: [{ description: "Apple\nA2633" }] }] })).toEqual([
      "Apple",
      "A2633",
    ]);
  });

  it("returns nothing when the photo has no text", () => {
    expect(extractAnnotatedText({ responses: [{}] })).toEqual([]);
  });

  it("surfaces per-image errors", () => {
    expect(() => extractAnnotatedText({ responses: [{ error: { message: "Bad image data." } }] })).toThrow(
      "Network error: Vision annotate error: Bad image data."
    );
  });

  it("rejects malformed bodies", () => {
    expect(() => extractAnnotatedText({})).toThrow(AnalysisError);
    expect(() => extractAnnotatedText({ responses: [] })).toThrow("Parse error: Vision response has no responses[]");
  });
});

describe("GoogleVisionTextRecognizer", () => {
  beforeEach(() => {
    vi.stubEnv("SUPABASE_URL", "");
    vi.stubEnv("SUPABASE_SERVICE_ROLE_KEY", "");
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  it("posts a TEXT_DETECTION request per photo", async () => {
    const fetchMock = vi.fn().mockResolvedValue(
      new Response(JSON.stringify({ responses: [{ fullTextAnnotation: { text: "NIKE\nUS 10" } }] }), { status: 200 })
    );
    vi.stubGlobal("fetch", fetchMock);

    const lines = await new GoogleVisionTextRecognizer(config).recognize(Buffer.from("img"));

    expect(lines).toEqual(["NIKE", "US 10"]);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://vision.test/v1/images:annotate?key=test-key");
    expect(JSON.parse(init.body)).toEqual({
      requests: [{ image: { content: "aW1n" }, features: [{ type: "TEXT_DETECTION" }] }],
    });
  });

  it("maps HTTP failures to network errors", async () => {
    vi.stubGlobal("fetch", vi.fn().mockResolvedValue(new Response("forbidden", { status: 403 })));

    const error = await captureError(new GoogleVisionTextRecognizer(config).recognize(Buffer.from("img")));

    expect(error.message).toBe("Network error: Vision HTTP 403: forbidden");
  });

  it("requires an API key", async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal("fetch", fetchMock);

    const error = await captureError(
      new GoogleVisionTextRecognizer({ ...config, google_vision_api_key: null }).recognize(Buffer.from("img"))
    );

    expect(error.code).toBe("api_key_missing");
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
