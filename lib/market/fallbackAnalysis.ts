/**
 * Fallback market analysis
 *
 * Used when no market research provider returns sold comps. Prices come from
 * brand/category bands and every derived figure is a fixed ratio of one base
 * price. Never throws - always returns estimates.
 */

import { CONDITION_IDS } from "@/lib/config/resaleConfig";
import type { AnalysisResult, PrecisionIdentificationResult } from "@/types/analysis";
import type {
  ConditionAssessment,
  ItemCondition,
  ListingStrategy,
  MarketConfidence,
  MarketData,
  PriceRange,
  PricingRecommendation,
  SoldListing,
} from "@/types/market";
import {
  createDescriptionTemplate,
  createKeywords,
  createOptimizedTitle,
  mapToMarketplaceCategory,
} from "./listingCopy";

/** Uniform source in [0, 1); injectable so estimates are reproducible in tests. */
export type RandomSource = () => number;

export interface FallbackOptions {
  random?: RandomSource;
  now?: () => Date;
}

const DAY_MS = 24 * 60 * 60 * 1000;
const SOLD_CONDITIONS = ["New", "Like New", "Excellent", "Very Good", "Good"];
const ASSUMED_CONDITION: ItemCondition = "Good";

export function randomBetween(min: number, max: number, random: RandomSource): number {
  return min + (max - min) * random();
}

export function randomIntBetween(min: number, max: number, random: RandomSource): number {
  return min + Math.min(max - min, Math.floor(random() * (max - min + 1)));
}

function priceBand(identification: PrecisionIdentificationResult): [number, number] {
  const brand = identification.brand.toLowerCase();
  const product = identification.exact_model_name.toLowerCase();

  if (brand.includes("guess")) {
    if (product.includes("shirt") || product.includes("tee")) return [15, 45];
    if (product.includes("dress")) return [25, 75];
    if (product.includes("jeans") || product.includes("pants")) return [30, 80];
    return [20, 60];
  }

  switch (identification.category) {
    case "Sneakers":
      if (brand.includes("nike") || brand.includes("jordan")) return [80, 300];
      if (brand.includes("adidas")) return [60, 250];
      return [40, 150];
    case "Electronics":
      return brand.includes("apple") ? [200, 800] : [50, 400];
    case "Clothing":
      return [15, 80];
    case "Accessories":
      return [15, 75];
    default:
      return [10, 50];
  }
}

export function estimateBasePrice(
  identification: PrecisionIdentificationResult,
  random: RandomSource = Math.random
): number {
  const [min, max] = priceBand(identification);
  return randomBetween(min, max, random);
}

export function createSoldListings(
  basePrice: number,
  count: number,
  random: RandomSource = Math.random,
  now: Date = new Date()
): SoldListing[] {
  const listings: SoldListing[] = [];
  for (let i = 0; i < count; i++) {
    const variance = randomBetween(0.7, 1.3, random);
    const daysAgo = randomBetween(1, 30, random);
    const condition = SOLD_CONDITIONS[randomIntBetween(0, SOLD_CONDITIONS.length - 1, random)];

    listings.push({
      title: `Similar Item ${i + 1}`,
      price: basePrice * variance,
      condition,
      sold_at: new Date(now.getTime() - daysAgo * DAY_MS).toISOString(),
      shipping_cost: randomBetween(5, 15, random),
      best_offer: random() < 0.5,
      auction: random() < 0.5,
      watchers: randomIntBetween(1, 20, random),
    });
  }
  return listings;
}

export function buildConditionPriceRange(basePrice: number, soldCount: number): PriceRange {
  return {
    new_with_tags: basePrice * 1.0,
    new_without_tags: basePrice * 0.95,
    like_new: basePrice * 0.85,
    excellent: basePrice * 0.75,
    very_good: basePrice * 0.65,
    good: basePrice * 0.5,
    acceptable: basePrice * 0.35,
    average: basePrice * 0.75,
    sold_count: soldCount,
    date_range: "Last 30 days",
  };
}

export function buildFallbackPricing(basePrice: number): PricingRecommendation {
  return {
    recommended_price: basePrice * 0.75,
    price_range: { min: basePrice * 0.6, max: basePrice * 0.9 },
    competitive_price: basePrice * 0.72,
    quick_sale_price: basePrice * 0.65,
    max_profit_price: basePrice * 0.85,
    pricing_strategy: "competitive",
    price_justification: ["Based on similar items", "Adjusted for condition"],
  };
}

export function buildMarketConfidence(identificationConfidence: number): MarketConfidence {
  const condition = 0.8;
  const pricing = 0.7;
  return {
    overall: (identificationConfidence + condition + pricing) / 3,
    identification: identificationConfidence,
    condition,
    pricing,
    data_quality: "fair",
  };
}

export function createFallbackMarketData(
  identification: PrecisionIdentificationResult,
  options: FallbackOptions = {}
): MarketData {
  const random = options.random ?? Math.random;
  const now = options.now ? options.now() : new Date();
  const basePrice = estimateBasePrice(identification, random);
  const soldListings = createSoldListings(basePrice, randomIntBetween(5, 15, random), random, now);

  return {
    sold_listings: soldListings,
    price_range: buildConditionPriceRange(basePrice, soldListings.length),
    market_trend: { direction: "stable", strength: "moderate", timeframe: "30 days", seasonal_factors: [] },
    demand_indicators: {
      watchers_per_listing: 8,
      views_per_listing: 150,
      time_to_sell: "normal",
      search_volume: "medium",
    },
    competition_level: "Moderate",
    last_updated: now.toISOString(),
  };
}

/**
 * Build a full analysis around market data. The base price is recovered
 * from price_range.average (= base * 0.75) so provider data and fallback
 * data flow through the same ratios.
 */
export function buildAnalysisFromMarketData(
  identification: PrecisionIdentificationResult,
  marketData: MarketData,
  imageCount: number,
  now: Date = new Date()
): AnalysisResult {
  const basePrice = marketData.price_range.average / 0.75;

  const assessment: ConditionAssessment = {
    detected_condition: ASSUMED_CONDITION,
    condition_confidence: 0.8,
    condition_notes: ["Overall good condition", "Some normal wear expected"],
    photography_recommendations: [
      "Take clear photos of any wear",
      "Show all angles",
      "Include close-ups of condition",
    ],
  };

  const pricing = buildFallbackPricing(basePrice);

  const listingStrategy: ListingStrategy = {
    recommended_title: createOptimizedTitle(identification, ASSUMED_CONDITION),
    keywords: createKeywords(identification),
    category_path: mapToMarketplaceCategory(identification.category),
    listing_format: "buy_it_now",
    condition_id: CONDITION_IDS[ASSUMED_CONDITION],
    photography_checklist: [
      "Main product photo",
      "Multiple angles",
      "Close-ups of condition",
      "Brand/size labels",
    ],
    description_template: createDescriptionTemplate(identification, assessment),
  };

  return {
    identification,
    market_data: marketData,
    condition_assessment: assessment,
    pricing,
    listing_strategy: listingStrategy,
    confidence: buildMarketConfidence(identification.confidence),
    realistic_price: pricing.recommended_price,
    image_count: imageCount,
    analyzed_at: now.toISOString(),
  };
}

export function createFallbackAnalysis(
  identification: PrecisionIdentificationResult,
  imageCount: number,
  options: FallbackOptions = {}
): AnalysisResult {
  const now = options.now ? options.now() : new Date();
  const marketData = createFallbackMarketData(identification, { ...options, now: () => now });
  return buildAnalysisFromMarketData(identification, marketData, imageCount, now);
}
