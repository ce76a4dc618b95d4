/**
 * Market research seam.
 *
 * A provider returns sold-comp market data for an identified product, or
 * null when it has nothing. The engine falls back to estimated data on null.
 */

import type { PrecisionIdentificationResult } from "@/types/analysis";
import type { ItemCondition, MarketData } from "@/types/market";
import { createFallbackMarketData, type FallbackOptions } from "./fallbackAnalysis";

export interface MarketResearchProvider {
  readonly name: string;
  researchProduct(
    identification: PrecisionIdentificationResult,
    condition: ItemCondition
  ): Promise<MarketData | null>;
}

/**
 * Estimates market data from brand/category price bands; no network.
 */
export class EstimatedMarketResearch implements MarketResearchProvider {
  readonly name = "estimated";

  constructor(private readonly options: FallbackOptions = {}) {}

  async researchProduct(identification: PrecisionIdentificationResult): Promise<MarketData | null> {
    return createFallbackMarketData(identification, this.options);
  }
}
