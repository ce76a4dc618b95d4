/**
 * Pricing intelligence
 *
 * Condition-adjusted price = market average * condition multiplier.
 * Every other figure is a fixed ratio of that price:
 * - range: 0.8x - 1.2x
 * - quick sale: 0.85x
 * - max profit: 1.15x
 */

import { CONDITION_PRICE_MULTIPLIERS, PRICING_STRATEGY_MULTIPLIERS } from "@/lib/config/resaleConfig";
import type { PrecisionIdentificationResult } from "@/types/analysis";
import type { ItemCondition, MarketData, PricingIntelligence } from "@/types/market";

export const PRICE_RANGE_MIN_RATIO = 0.8;
export const PRICE_RANGE_MAX_RATIO = 1.2;
export const QUICK_SALE_RATIO = PRICING_STRATEGY_MULTIPLIERS.quick_sale;
export const MAX_PROFIT_RATIO = PRICING_STRATEGY_MULTIPLIERS.premium;

export function conditionPriceMultiplier(condition: ItemCondition): number {
  return CONDITION_PRICE_MULTIPLIERS[condition];
}

/**
 * Pure form of the pricing formula; exposed for callers that only have a price.
 */
export function buildPricingIntelligence(price: number, multiplier: number): PricingIntelligence {
  const adjusted = price * multiplier;
  return {
    optimal_price: adjusted,
    price_range: { min: adjusted * PRICE_RANGE_MIN_RATIO, max: adjusted * PRICE_RANGE_MAX_RATIO },
    quick_sale_price: adjusted * QUICK_SALE_RATIO,
    max_profit_price: adjusted * MAX_PROFIT_RATIO,
    pricing_strategy: "competitive",
    confidence_level: 0.8,
    market_factors: ["Based on recent sales data", "Adjusted for condition"],
  };
}

export function getPricingRecommendations(
  product: PrecisionIdentificationResult,
  condition: ItemCondition,
  marketData: MarketData
): PricingIntelligence {
  const intelligence = buildPricingIntelligence(
    marketData.price_range.average,
    conditionPriceMultiplier(condition)
  );
  console.log("PRICING_RECOMMENDATION", {
    model: product.exact_model_name,
    condition,
    optimal_price: Number(intelligence.optimal_price.toFixed(2)),
  });
  return intelligence;
}
