/**
 * Product authentication summary.
 *
 * Returns a baseline verdict; a dedicated authentication model is not wired in
 * yet, so photos and identification only feed the log line.
 */

import type { PrecisionIdentificationResult } from "@/types/analysis";
import type { AuthenticationResult } from "@/types/market";

export function authenticateProduct(
  imageCount: number,
  identification: PrecisionIdentificationResult
): AuthenticationResult {
  console.log("AUTHENTICATION_BASELINE", {
    image_count: imageCount,
    brand: identification.brand,
    model: identification.exact_model_name,
  });

  return {
    is_authentic: true,
    confidence: 0.85,
    authenticity_factors: ["Brand markings consistent", "Construction quality good"],
    warnings: [],
    recommendations: ["Get professional authentication for high-value items"],
  };
}
