/**
 * Analysis Types
 *
 * Shared type definitions for photo-based item analysis.
 */

import type {
  ConditionAssessment,
  ListingStrategy,
  MarketConfidence,
  MarketData,
  PricingRecommendation,
} from "./market";

export type ProductCategory =
  | "Sneakers"
  | "Electronics"
  | "Clothing"
  | "Accessories"
  | "Collectibles"
  | "Home"
  | "Sports"
  | "Toys"
  | "Books"
  | "Other";

export type IdentificationMethod =
  | "visual_and_text"
  | "visual_only"
  | "text_only"
  | "category_based"
  | "barcode";

export interface PrecisionIdentificationResult {
  exact_model_name: string;
  brand: string;
  product_line: string;
  style_variant: string;
  style_code: string;
  colorway: string;
  size: string;
  category: ProductCategory;
  subcategory: string;
  identification_method: IdentificationMethod;
  confidence: number; // 0..1
  identification_details: string[];
  alternative_possibilities: string[];
}

export interface AnalysisResult {
  identification: PrecisionIdentificationResult;
  market_data: MarketData;
  condition_assessment: ConditionAssessment;
  pricing: PricingRecommendation;
  listing_strategy: ListingStrategy;
  confidence: MarketConfidence;
  /** Recommended listing price; the anchor for prospecting math */
  realistic_price: number;
  image_count: number;
  analyzed_at: string;
}

export type ProspectDecision =
  | "strong_buy"
  | "buy"
  | "maybe_worth_it"
  | "investigate"
  | "pass";

export interface ProspectAnalysis {
  identification: PrecisionIdentificationResult;
  market_data: MarketData;
  category_hint: string | null;
  max_buy_price: number;
  target_buy_price: number;
  break_even_price: number;
  potential_profit: number;
  expected_roi_pct: number;
  recommendation: ProspectDecision;
  confidence: MarketConfidence;
  image_count: number;
}

export interface AnalysisProgressState {
  is_analyzing: boolean;
  progress_message: string;
  current_step: number;
  total_steps: number;
}
