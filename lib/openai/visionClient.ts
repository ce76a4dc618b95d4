/**
 * OpenAI chat-completions client for photo identification.
 *
 * Sends up to 4 prepared photos as image_url data URLs (detail: high) and
 * returns the first choice's message content. Throws AnalysisError only.
 */

import { BUSINESS_RULES, getResaleConfig, type ResaleConfig } from "@/lib/config/resaleConfig";
import { AnalysisError, isAbortError, toAnalysisError } from "@/lib/errors/analysisError";
import type { PreparedImage } from "@/lib/images/prepareImages";
import { extractRequestId, logAnalysisEvent } from "@/lib/logging/analysisLogging";

type ChatContentPart =
  | { type: "text"; text: string }
  | { type: "image_url"; image_url: { url: string; detail: "high" | "low" | "auto" } };

interface ChatMessage {
  role: "system" | "user";
  content: string | ChatContentPart[];
}

export interface VisionCompletionRequest {
  operation: string;
  system: string;
  user: string;
  images: PreparedImage[];
  max_tokens?: number;
  temperature?: number;
  config?: ResaleConfig;
}

export function buildVisionMessages(system: string, user: string, images: PreparedImage[]): ChatMessage[] {
  const imageParts: ChatContentPart[] = images
    .slice(0, BUSINESS_RULES.max_images_per_request)
    .map((image): ChatContentPart => ({
      type: "image_url",
      image_url: { url: `data:image/jpeg;base64,${image.base64}`, detail: "high" },
    }));

  return [
    { role: "system", content: system },
    { role: "user", content: [{ type: "text", text: user }, ...imageParts] },
  ];
}

/**
 * Extract choices[0].message.content from a chat-completions body.
 */
export function extractMessageContent(body: unknown): string | null {
  if (!body || typeof body !== "object" || !("choices" in body)) return null;
  const choices = body.choices;
  if (!Array.isArray(choices) || choices.length === 0) return null;
  const first: unknown = choices[0];
  if (!first || typeof first !== "object" || !("message" in first)) return null;
  const message = first.message;
  if (!message || typeof message !== "object" || !("content" in message)) return null;
  return typeof message.content === "string" && message.content.trim() ? message.content : null;
}

export async function requestVisionCompletion(request: VisionCompletionRequest): Promise<string> {
  const config = request.config ?? getResaleConfig();
  if (!config.openai_api_key) {
    throw AnalysisError.apiKeyMissing();
  }

  const body = JSON.stringify({
    model: config.openai_model,
    messages: buildVisionMessages(request.system, request.user, request.images),
    max_tokens: request.max_tokens ?? BUSINESS_RULES.openai_max_tokens,
    temperature: request.temperature ?? 0.1,
  });

  const imageCount = Math.min(request.images.length, BUSINESS_RULES.max_images_per_request);
  logAnalysisEvent({
    event_type: "PROVIDER_REQUEST",
    operation: request.operation,
    provider: "openai",
    image_count: imageCount,
    detail: { model: config.openai_model },
  });

  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), config.request_timeout_ms);
  const startedAt = Date.now();

  try {
    const res = await fetch(config.openai_endpoint, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${config.openai_api_key}`,
      },
      body,
      signal: controller.signal,
    });

    const durationMs = Date.now() - startedAt;
    logAnalysisEvent({
      event_type: "PROVIDER_RESPONSE",
      operation: request.operation,
      provider: "openai",
      http_status: res.status,
      duration_ms: durationMs,
      request_id: extractRequestId(res.headers),
    });

    if (!res.ok) {
      const errText = await res.text();
      throw AnalysisError.network(`OpenAI HTTP ${res.status}: ${errText.slice(0, 200)}`);
    }

    let json: unknown;
    try {
      json = await res.json();
    } catch (error) {
      // The abort timer can fire while the body is still streaming
      if (isAbortError(error)) throw AnalysisError.timeout();
      throw AnalysisError.parse(
        `OpenAI response body is not JSON (${error instanceof Error ? error.message : String(error)})`
      );
    }

    const content = extractMessageContent(json);
    if (!content) {
      throw AnalysisError.parse("No content in OpenAI response");
    }
    return content;
  } catch (error) {
    const analysisError = toAnalysisError(error);
    logAnalysisEvent({
      event_type: "PROVIDER_ERROR",
      operation: request.operation,
      provider: "openai",
      duration_ms: Date.now() - startedAt,
      error_code: analysisError.code,
      error: analysisError.message,
    });
    throw analysisError;
  } finally {
    clearTimeout(timer);
  }
}
