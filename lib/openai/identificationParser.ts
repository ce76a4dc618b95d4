/**
 * Parse the identification JSON returned by the vision model.
 *
 * Models sometimes wrap JSON in markdown fences or add prose around it, so the
 * content is cleaned first. If strict parsing still fails, the known keys are
 * pulled out individually, with defaults for anything missing.
 */

import type {
  IdentificationMethod,
  PrecisionIdentificationResult,
  ProductCategory,
} from "@/types/analysis";

const CATEGORY_LOOKUP: Record<string, ProductCategory> = {
  sneakers: "Sneakers",
  shoes: "Sneakers",
  electronics: "Electronics",
  clothing: "Clothing",
  accessories: "Accessories",
  collectibles: "Collectibles",
  home: "Home",
  sports: "Sports",
  toys: "Toys",
  books: "Books",
  other: "Other",
};

export function toProductCategory(value: unknown): ProductCategory {
  if (typeof value !== "string") return "Other";
  return CATEGORY_LOOKUP[value.trim().toLowerCase()] ?? "Other";
}

/**
 * Strip ```json fences and any text outside the outermost {...}.
 */
export function cleanMarkdownFromJson(content: string): string {
  let cleaned = content.replace(/```json/gi, "").replace(/```/g, "");

  const start = cleaned.indexOf("{");
  const end = cleaned.lastIndexOf("}");
  if (start !== -1 && end > start) {
    cleaned = cleaned.slice(start, end + 1);
  }

  return cleaned.trim();
}

function readString(record: Record<string, unknown>, key: string): string {
  const value = record[key];
  return typeof value === "string" ? value.trim() : "";
}

function readStringList(record: Record<string, unknown>, key: string): string[] {
  const value = record[key];
  if (!Array.isArray(value)) return [];
  return value
    .filter((item): item is string => typeof item === "string")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function readConfidence(record: Record<string, unknown>, fallback: number): number {
  const value = record.confidence;
  if (typeof value !== "number" || !Number.isFinite(value)) return fallback;
  // Some responses use 0-100 instead of 0-1
  const normalized = value > 1 ? value / 100 : value;
  return Math.min(1, Math.max(0, normalized));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function identificationFromRecord(
  record: Record<string, unknown>,
  method: IdentificationMethod = "visual_and_text"
): PrecisionIdentificationResult {
  return {
    exact_model_name: readString(record, "exactModelName"),
    brand: readString(record, "brand"),
    product_line: readString(record, "productLine"),
    style_variant: readString(record, "styleVariant"),
    style_code: readString(record, "styleCode"),
    colorway: readString(record, "colorway"),
    size: readString(record, "size"),
    category: toProductCategory(record.category),
    subcategory: readString(record, "subcategory"),
    identification_method: method,
    confidence: readConfidence(record, 0.5),
    identification_details: readStringList(record, "identificationDetails"),
    alternative_possibilities: readStringList(record, "alternativePossibilities"),
  };
}

function extractField(json: string, key: string): string | null {
  const pattern = new RegExp(`"${key}"\\s*:\\s*"([^"]+)"`);
  const match = pattern.exec(json);
  if (!match) return null;
  const value = match[1].trim();
  return value ? value : null;
}

export const PARTIAL_IDENTIFICATION_DETAIL = "Extracted from partial JSON response";

/**
 * Best-effort recovery from a reply that did not decode (truncated output,
 * prose, wrong shape). Always yields an identification; missing fields default.
 */
export function parsePartialIdentification(json: string): PrecisionIdentificationResult {
  const exactModelName = extractField(json, "exactModelName");
  const brand = extractField(json, "brand");
  const size = extractField(json, "size");
  const colorway = extractField(json, "colorway");
  const category = extractField(json, "category");

  return {
    exact_model_name: exactModelName ?? "Unknown Product",
    brand: brand ?? "",
    product_line: "",
    style_variant: "",
    style_code: "",
    colorway: colorway ?? "",
    size: size ?? "",
    category: toProductCategory(category),
    subcategory: "",
    identification_method: "visual_only",
    confidence: 0.7,
    identification_details: [PARTIAL_IDENTIFICATION_DETAIL],
    alternative_possibilities: [],
  };
}

export function parseIdentification(content: string): PrecisionIdentificationResult {
  const cleaned = cleanMarkdownFromJson(content);

  let parsed: unknown;
  try {
    parsed = JSON.parse(cleaned);
  } catch {
    return parsePartialIdentification(cleaned);
  }

  if (!isRecord(parsed)) return parsePartialIdentification(cleaned);
  const identification = identificationFromRecord(parsed);
  if (!identification.exact_model_name && !identification.brand) {
    return parsePartialIdentification(cleaned);
  }
  if (!identification.exact_model_name) {
    identification.exact_model_name = "Unknown Product";
  }
  return identification;
}

export function createFallbackIdentification(): PrecisionIdentificationResult {
  return {
    exact_model_name: "Product",
    brand: "Unknown",
    product_line: "",
    style_variant: "",
    style_code: "",
    colorway: "",
    size: "",
    category: "Other",
    subcategory: "",
    identification_method: "category_based",
    confidence: 0.3,
    identification_details: ["Basic visual analysis"],
    alternative_possibilities: [],
  };
}

export function createBarcodeIdentification(barcode: string): PrecisionIdentificationResult {
  const code = barcode.trim();
  return {
    exact_model_name: "Scanned Product",
    brand: "Unknown",
    product_line: "",
    style_variant: "",
    style_code: code,
    colorway: "",
    size: "",
    category: "Other",
    subcategory: "",
    identification_method: "barcode",
    confidence: 0.6,
    identification_details: [`Identified by barcode: ${code}`],
    alternative_possibilities: [],
  };
}
