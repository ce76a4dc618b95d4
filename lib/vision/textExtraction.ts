/**
 * OCR fan-out helpers: one recognition request per photo, results joined in photo order.
 */

import { toAnalysisError } from "@/lib/errors/analysisError";
import { logAnalysisEvent } from "@/lib/logging/analysisLogging";
import type { TextRecognizer } from "./textRecognition";

export const KNOWN_BRANDS = [
  "Nike",
  "Adidas",
  "Jordan",
  "Apple",
  "Samsung",
  "Supreme",
  "Off-White",
  "Yeezy",
] as const;

export async function extractTextFromImages(images: Buffer[], recognizer: TextRecognizer): Promise<string[]> {
  if (images.length === 0) return [];

  const perImage = await Promise.all(
    images.map(async (image, index) => {
      try {
        return await recognizer.recognize(image);
      } catch (error) {
        const analysisError = toAnalysisError(error);
        logAnalysisEvent({
          event_type: "PROVIDER_ERROR",
          operation: "text_detection",
          provider: "google_vision",
          error_code: analysisError.code,
          error: analysisError.message,
          detail: { image_index: index },
        });
        return [];
      }
    })
  );

  return perImage.flat();
}

/**
 * Keep lines that mention a known brand (case-insensitive). Lines are kept
 * verbatim, deduplicated in first-seen order.
 */
export function filterBrandMentions(lines: string[], brands: readonly string[] = KNOWN_BRANDS): string[] {
  const needles = brands.map((brand) => brand.toLowerCase());
  const seen = new Set<string>();
  const found: string[] = [];
  for (const line of lines) {
    const lower = line.toLowerCase();
    if (!needles.some((needle) => lower.includes(needle))) continue;
    if (seen.has(line)) continue;
    seen.add(line);
    found.push(line);
  }
  return found;
}

export async function detectBrands(images: Buffer[], recognizer: TextRecognizer): Promise<string[]> {
  const lines = await extractTextFromImages(images, recognizer);
  return filterBrandMentions(lines);
}
