/**
 * ROI math for a sourced item.
 * Fees = marketplace final value fee (13.25%) + flat shipping ($8.50).
 */

import { BUSINESS_RULES } from "@/lib/config/resaleConfig";
import type { RoiCalculation, RoiTier } from "@/types/market";

export function estimateSellingFees(sellingPrice: number): number {
  return sellingPrice * BUSINESS_RULES.marketplace_fee_rate + BUSINESS_RULES.default_shipping_cost;
}

export function calculateRoi(itemCost: number, sellingPrice: number): RoiCalculation {
  const estimatedFees = estimateSellingFees(sellingPrice);
  const projectedProfit = sellingPrice - itemCost - estimatedFees;
  const roiPct = itemCost > 0 ? (projectedProfit / itemCost) * 100 : 0;
  return {
    item_cost: itemCost,
    selling_price: sellingPrice,
    estimated_fees: estimatedFees,
    projected_profit: projectedProfit,
    roi_pct: roiPct,
    tier: classifyRoi(roiPct),
  };
}

export function classifyRoi(roiPct: number): RoiTier {
  if (roiPct >= BUSINESS_RULES.preferred_roi_threshold) return "preferred";
  if (roiPct >= BUSINESS_RULES.minimum_roi_threshold) return "acceptable";
  return "below_minimum";
}
