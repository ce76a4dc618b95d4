import type { MarketIntelligence } from "@/types/market";

/**
 * Market intelligence summary for a product name.
 * Static until a demand data source is wired in; product is only used for logging.
 */
export function getMarketIntelligence(product: string): MarketIntelligence {
  console.log("MARKET_INTELLIGENCE_STATIC", { product });
  return {
    demand: "medium",
    competition: "Moderate",
    price_stability: "stable",
    seasonal_trends: [],
    market_insights: ["Popular item with steady demand", "Good profit potential"],
  };
}
