/**
 * Per-call API usage logging (OpenAI vision, Google Vision OCR, cache hits).
 * Inserts into api_usage_events; idempotency_key avoids double-counting on retries.
 */

import { getSupabaseServiceClient } from "@/lib/supabase/serviceClient";

export type UsageProvider = "openai" | "google_vision" | "cache";

export type UsageEventInput = {
  provider: UsageProvider;
  operation: string;
  cache_status: "hit" | "miss" | "none";
  images_hash?: string | null;
  image_count?: number;
  duration_ms?: number | null;
  success: boolean;
  error_code?: string | null;
  meta?: Record<string, unknown>;
  idempotency_key: string;
};

/**
 * Format: {runId}:{provider}:{operation}:{imagesHash||'-'}:{cache_status}
 */
export function buildUsageIdempotencyKey(params: {
  runId: string;
  provider: UsageProvider;
  operation: string;
  imagesHash?: string | null;
  cache_status: string;
}): string {
  const hash = params.imagesHash ? params.imagesHash.slice(0, 16) : "-";
  return `${params.runId}:${params.provider}:${params.operation}:${hash}:${params.cache_status}`;
}

export async function logUsageEvent(input: UsageEventInput): Promise<void> {
  const client = getSupabaseServiceClient();
  if (!client) return;

  const {
    provider,
    operation,
    cache_status,
    idempotency_key,
    images_hash,
    image_count = 0,
    duration_ms,
    success,
    error_code,
    meta = {},
  } = input;

  try {
    const { error } = await client.from("api_usage_events").upsert(
      {
        provider,
        operation,
        cache_status,
        images_hash: images_hash ?? null,
        image_count,
        duration_ms: duration_ms ?? null,
        success,
        error_code: error_code ?? null,
        meta,
        idempotency_key,
      },
      { onConflict: "idempotency_key", ignoreDuplicates: true }
    );

    if (error) {
      if (error.code === "23505") {
        // unique_violation = idempotent duplicate
        return;
      }
      console.error("USAGE_LOG_INSERT_ERROR", {
        idempotency_key: idempotency_key.substring(0, 80),
        provider,
        operation,
        error: error.message,
      });
    }
  } catch (err) {
    console.error("USAGE_LOG_EXCEPTION", {
      idempotency_key: idempotency_key.substring(0, 80),
      error: err instanceof Error ? err.message : String(err),
    });
  }
}
