/**
 * Runtime configuration.
 *
 * Keys and endpoints are read from process.env on every call so tests and
 * long-running scripts pick up changes without a restart.
 */

import type { ItemCondition, PricingStrategy } from "@/types/market";

export interface ResaleConfig {
  openai_api_key: string | null;
  openai_model: string;
  openai_endpoint: string;
  google_vision_api_key: string | null;
  google_vision_endpoint: string;
  supabase_url: string | null;
  supabase_service_key: string | null;
  request_timeout_ms: number;
}

export const OPENAI_CHAT_COMPLETIONS_URL = "https://api.openai.com/v1/chat/completions";
export const GOOGLE_VISION_ANNOTATE_URL = "https://vision.googleapis.com/v1/images:annotate";

const DEFAULT_MODEL = "gpt-4o";
const DEFAULT_TIMEOUT_MS = 60_000;

export const BUSINESS_RULES = {
  max_photos: 8,
  max_image_dimension: 1024,
  jpeg_quality: 80,
  max_images_per_request: 4,
  openai_max_tokens: 1500,
  marketplace_fee_rate: 0.1325,
  default_shipping_cost: 8.5,
  minimum_roi_threshold: 50,
  preferred_roi_threshold: 100,
} as const;

export const CONDITION_PRICE_MULTIPLIERS: Record<ItemCondition, number> = {
  "New with tags": 1.0,
  "New without tags": 0.95,
  "New other": 0.9,
  "Like New": 0.85,
  Excellent: 0.8,
  "Very Good": 0.7,
  Good: 0.6,
  Acceptable: 0.45,
  "For parts or not working": 0.3,
};

/** Marketplace condition ids used when a listing is exported */
export const CONDITION_IDS: Record<ItemCondition, string> = {
  "New with tags": "1000",
  "New without tags": "1500",
  "New other": "1750",
  "Like New": "2000",
  Excellent: "2500",
  "Very Good": "3000",
  Good: "4000",
  Acceptable: "5000",
  "For parts or not working": "7000",
};

export const PRICING_STRATEGY_MULTIPLIERS: Record<PricingStrategy, number> = {
  quick_sale: 0.85,
  market: 1.0,
  premium: 1.15,
  auction: 0.75,
  best_offer: 1.05,
  competitive: 1.0,
};

function readEnv(name: string): string | null {
  const value = process.env[name];
  if (!value || !value.trim()) return null;
  return value.trim();
}

function readTimeout(): number {
  const raw = readEnv("ANALYSIS_TIMEOUT_MS");
  if (!raw) return DEFAULT_TIMEOUT_MS;
  const parsed = Number(raw);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : DEFAULT_TIMEOUT_MS;
}

export function getResaleConfig(): ResaleConfig {
  return {
    openai_api_key: readEnv("OPENAI_API_KEY"),
    openai_model: readEnv("OPENAI_VISION_MODEL") ?? DEFAULT_MODEL,
    openai_endpoint: readEnv("OPENAI_ENDPOINT") ?? OPENAI_CHAT_COMPLETIONS_URL,
    google_vision_api_key: readEnv("GOOGLE_CLOUD_API_KEY"),
    google_vision_endpoint: readEnv("GOOGLE_VISION_ENDPOINT") ?? GOOGLE_VISION_ANNOTATE_URL,
    supabase_url: readEnv("SUPABASE_URL"),
    supabase_service_key: readEnv("SUPABASE_SERVICE_ROLE_KEY"),
    request_timeout_ms: readTimeout(),
  };
}

export interface ConfigurationStatus {
  openai: boolean;
  google_vision: boolean;
  supabase: boolean;
  missing: string[];
  summary: string;
}

export function getConfigurationStatus(config: ResaleConfig = getResaleConfig()): ConfigurationStatus {
  const openai = config.openai_api_key !== null;
  const googleVision = config.google_vision_api_key !== null;
  const supabase = config.supabase_url !== null && config.supabase_service_key !== null;

  const missing: string[] = [];
  if (!openai) missing.push("OpenAI");
  if (!googleVision) missing.push("Google Cloud Vision");
  if (!supabase) missing.push("Supabase");

  return {
    openai,
    google_vision: googleVision,
    supabase,
    missing,
    summary: missing.length === 0 ? "All systems ready" : `Missing: ${missing.join(", ")}`,
  };
}
