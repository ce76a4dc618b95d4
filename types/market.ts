/**
 * Market, pricing and authentication data contracts.
 *
 * Flat value records; every number is USD unless the field name says otherwise.
 */

export type ItemCondition =
  | "New with tags"
  | "New without tags"
  | "New other"
  | "Like New"
  | "Excellent"
  | "Very Good"
  | "Good"
  | "Acceptable"
  | "For parts or not working";

export type CompetitionLevel = "Low" | "Moderate" | "High" | "Very High";

export type PricingStrategy =
  | "quick_sale"
  | "market"
  | "premium"
  | "auction"
  | "best_offer"
  | "competitive";

export type DemandLevel = "high" | "medium" | "low";

export type PriceStability = "stable" | "volatile" | "increasing" | "decreasing";

export interface SoldListing {
  title: string;
  price: number;
  condition: string;
  sold_at: string;
  shipping_cost: number | null;
  best_offer: boolean;
  auction: boolean;
  watchers: number | null;
}

export interface PriceRange {
  new_with_tags: number;
  new_without_tags: number;
  like_new: number;
  excellent: number;
  very_good: number;
  good: number;
  acceptable: number;
  average: number;
  sold_count: number;
  date_range: string;
}

export interface MarketTrend {
  direction: "up" | "down" | "stable";
  strength: "weak" | "moderate" | "strong";
  timeframe: string;
  seasonal_factors: string[];
}

export interface DemandIndicators {
  watchers_per_listing: number;
  views_per_listing: number;
  time_to_sell: "fast" | "normal" | "slow";
  search_volume: "high" | "medium" | "low";
}

export interface MarketData {
  sold_listings: SoldListing[];
  price_range: PriceRange;
  market_trend: MarketTrend;
  demand_indicators: DemandIndicators;
  competition_level: CompetitionLevel;
  last_updated: string;
}

export interface ConditionAssessment {
  detected_condition: ItemCondition;
  condition_confidence: number;
  condition_notes: string[];
  photography_recommendations: string[];
}

export interface PricingRecommendation {
  recommended_price: number;
  price_range: { min: number; max: number };
  competitive_price: number;
  quick_sale_price: number;
  max_profit_price: number;
  pricing_strategy: PricingStrategy;
  price_justification: string[];
}

export interface ListingStrategy {
  recommended_title: string;
  keywords: string[];
  category_path: string;
  listing_format: "buy_it_now" | "auction";
  condition_id: string;
  photography_checklist: string[];
  description_template: string;
}

export interface MarketConfidence {
  overall: number;
  identification: number;
  condition: number;
  pricing: number;
  data_quality: "excellent" | "good" | "fair" | "poor";
}

export interface MarketIntelligence {
  demand: DemandLevel;
  competition: CompetitionLevel;
  price_stability: PriceStability;
  seasonal_trends: string[];
  market_insights: string[];
}

export interface AuthenticationResult {
  is_authentic: boolean;
  confidence: number;
  authenticity_factors: string[];
  warnings: string[];
  recommendations: string[];
}

export interface PricingIntelligence {
  optimal_price: number;
  price_range: { min: number; max: number };
  quick_sale_price: number;
  max_profit_price: number;
  pricing_strategy: PricingStrategy;
  confidence_level: number;
  market_factors: string[];
}

export type RoiTier = "preferred" | "acceptable" | "below_minimum";

export interface RoiCalculation {
  item_cost: number;
  selling_price: number;
  estimated_fees: number;
  projected_profit: number;
  roi_pct: number;
  tier: RoiTier;
}
