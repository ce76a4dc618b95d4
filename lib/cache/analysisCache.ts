/**
 * Identification cache
 *
 * Caches vision-model identifications in Supabase keyed by a hash of the
 * prepared photos, so re-running an analysis on the same photos skips the
 * OpenAI call. Entries are valid for 7 days. Cache failures are treated as misses.
 */

import type { SupabaseClient } from "@supabase/supabase-js";
import { getSupabaseServiceClient } from "@/lib/supabase/serviceClient";
import type {
  IdentificationMethod,
  PrecisionIdentificationResult,
  ProductCategory,
} from "@/types/analysis";

const TABLE = "photo_analysis_cache";
const TTL_DAYS = 7;

export interface AnalysisCacheKey {
  imagesHash: string;
  operation: string;
}

const CATEGORIES: readonly ProductCategory[] = [
  "Sneakers",
  "Electronics",
  "Clothing",
  "Accessories",
  "Collectibles",
  "Home",
  "Sports",
  "Toys",
  "Books",
  "Other",
];

const METHODS: readonly IdentificationMethod[] = [
  "visual_and_text",
  "visual_only",
  "text_only",
  "category_based",
  "barcode",
];

function isCategory(value: unknown): value is ProductCategory {
  return CATEGORIES.some((category) => category === value);
}

function isMethod(value: unknown): value is IdentificationMethod {
  return METHODS.some((method) => method === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

/**
 * Validate a stored payload; rows written by older code shapes are ignored.
 */
export function validateCachedIdentification(value: unknown): PrecisionIdentificationResult | null {
  if (!isRecord(value)) return null;
  const row = value;

  const stringKeys = [
    "exact_model_name",
    "brand",
    "product_line",
    "style_variant",
    "style_code",
    "colorway",
    "size",
    "subcategory",
  ] as const;
  const strings: Record<(typeof stringKeys)[number], string> = {
    exact_model_name: "",
    brand: "",
    product_line: "",
    style_variant: "",
    style_code: "",
    colorway: "",
    size: "",
    subcategory: "",
  };
  for (const key of stringKeys) {
    const field = row[key];
    if (typeof field !== "string") return null;
    strings[key] = field;
  }

  const { category, identification_method, confidence, identification_details, alternative_possibilities } = row;
  if (!isCategory(category) || !isMethod(identification_method)) return null;
  if (typeof confidence !== "number" || !Number.isFinite(confidence)) return null;
  if (!isStringArray(identification_details) || !isStringArray(alternative_possibilities)) return null;

  return {
    ...strings,
    category,
    identification_method,
    confidence,
    identification_details,
    alternative_possibilities,
  };
}

export class AnalysisCache {
  constructor(private readonly client: SupabaseClient | null = getSupabaseServiceClient()) {}

  get enabled(): boolean {
    return this.client !== null;
  }

  async get(key: AnalysisCacheKey): Promise<PrecisionIdentificationResult | null> {
    if (!this.client) return null;

    try {
      const nowIso = new Date().toISOString();
      const { data, error } = await this.client
        .from(TABLE)
        .select("payload")
        .eq("images_hash", key.imagesHash)
        .eq("operation", key.operation)
        .gt("expires_at", nowIso)
        .maybeSingle();

      if (error) {
        console.error("ANALYSIS_CACHE_LOOKUP_ERROR", {
          images_hash: key.imagesHash,
          operation: key.operation,
          error: error.message,
        });
        return null;
      }

      if (!data) {
        console.log("ANALYSIS_CACHE_MISS", { images_hash: key.imagesHash, operation: key.operation });
        return null;
      }

      const payload = validateCachedIdentification(data.payload);
      if (!payload) {
        console.warn("ANALYSIS_CACHE_INVALID_PAYLOAD", { images_hash: key.imagesHash, operation: key.operation });
        return null;
      }

      console.log("ANALYSIS_CACHE_HIT", { images_hash: key.imagesHash, operation: key.operation });
      return payload;
    } catch (error) {
      console.error("ANALYSIS_CACHE_LOOKUP_EXCEPTION", {
        images_hash: key.imagesHash,
        operation: key.operation,
        error: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  async set(key: AnalysisCacheKey, payload: PrecisionIdentificationResult): Promise<void> {
    if (!this.client) return;

    try {
      const now = new Date();
      const expires = new Date(now.getTime() + TTL_DAYS * 24 * 60 * 60 * 1000);
      const { error } = await this.client.from(TABLE).upsert(
        {
          images_hash: key.imagesHash,
          operation: key.operation,
          payload,
          fetched_at: now.toISOString(),
          expires_at: expires.toISOString(),
        },
        { onConflict: "images_hash,operation" }
      );

      if (error) {
        console.error("ANALYSIS_CACHE_STORE_ERROR", {
          images_hash: key.imagesHash,
          operation: key.operation,
          error: error.message,
        });
      }
    } catch (error) {
      console.error("ANALYSIS_CACHE_STORE_EXCEPTION", {
        images_hash: key.imagesHash,
        operation: key.operation,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
