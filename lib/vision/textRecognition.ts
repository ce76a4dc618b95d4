/**
 * Text recognition (OCR) provider.
 *
 * Google Cloud Vision TEXT_DETECTION over REST; one request per photo.
 * Returns recognized lines (top candidate per line), trimmed, in reading order.
 */

import { randomUUID } from "crypto";
import { getResaleConfig, type ResaleConfig } from "@/lib/config/resaleConfig";
import { AnalysisError, toAnalysisError } from "@/lib/errors/analysisError";
import { extractRequestId, logAnalysisEvent } from "@/lib/logging/analysisLogging";
import { buildUsageIdempotencyKey, logUsageEvent } from "@/lib/usage/logUsageEvent";

export interface TextRecognizer {
  recognize(image: Buffer): Promise<string[]>;
}

export function splitRecognizedText(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Pull text from one entry of an images:annotate response.
 * Prefers fullTextAnnotation.text, then textAnnotations[0].description.
 */
export function extractAnnotatedText(body: unknown): string[] {
  if (!isRecord(body) || !Array.isArray(body.responses) || body.responses.length === 0) {
    throw AnalysisError.parse("Vision response has no responses[]");
  }
  const first: unknown = body.responses[0];
  if (!isRecord(first)) {
    throw AnalysisError.parse("Vision response entry is not an object");
  }
  if (isRecord(first.error) && typeof first.error.message === "string") {
    throw AnalysisError.network(`Vision annotate error: ${first.error.message}`);
  }

  const full = first.fullTextAnnotation;
  if (isRecord(full) && typeof full.text === "string") {
    return splitRecognizedText(full.text);
  }

  const annotations = first.textAnnotations;
  if (Array.isArray(annotations) && annotations.length > 0) {
    const head: unknown = annotations[0];
    if (isRecord(head) && typeof head.description === "string") {
      return splitRecognizedText(head.description);
    }
  }

  // No text found in the photo
  return [];
}

export class GoogleVisionTextRecognizer implements TextRecognizer {
  constructor(private readonly config: ResaleConfig = getResaleConfig()) {}

  async recognize(image: Buffer): Promise<string[]> {
    const apiKey = this.config.google_vision_api_key;
    if (!apiKey) {
      throw AnalysisError.apiKeyMissing();
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.config.request_timeout_ms);
    const startedAt = Date.now();

    try {
      const url = `${this.config.google_vision_endpoint}?key=${encodeURIComponent(apiKey)}`;
      const res = await fetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          requests: [
            {
              image: { content: image.toString("base64") },
              features: [{ type: "TEXT_DETECTION" }],
            },
          ],
        }),
        signal: controller.signal,
      });

      logAnalysisEvent({
        event_type: "PROVIDER_RESPONSE",
        operation: "text_detection",
        provider: "google_vision",
        http_status: res.status,
        duration_ms: Date.now() - startedAt,
        request_id: extractRequestId(res.headers),
      });
      await logUsageEvent({
        provider: "google_vision",
        operation: "text_detection",
        cache_status: "none",
        image_count: 1,
        duration_ms: Date.now() - startedAt,
        success: res.ok,
        error_code: res.ok ? null : `http_${res.status}`,
        idempotency_key: buildUsageIdempotencyKey({
          runId: randomUUID(),
          provider: "google_vision",
          operation: "text_detection",
          cache_status: "none",
        }),
      });

      if (!res.ok) {
        const errText = await res.text();
        throw AnalysisError.network(`Vision HTTP ${res.status}: ${errText.slice(0, 200)}`);
      }

      return extractAnnotatedText(await res.json());
    } catch (error) {
      throw toAnalysisError(error);
    } finally {
      clearTimeout(timer);
    }
  }
}
