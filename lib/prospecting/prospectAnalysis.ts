/**
 * Prospecting math: what to pay for an item before buying it.
 *
 * Anchored on the analysis' realistic market price:
 * - max buy: 40%, target buy: 30%, break-even (after fees): 65%
 * - potential profit = price - max buy - 15% fees
 * - expected ROI = profit / max buy
 */

import type { AnalysisResult, ProspectAnalysis, ProspectDecision } from "@/types/analysis";

const MAX_BUY_RATIO = 0.4;
const TARGET_BUY_RATIO = 0.3;
const BREAK_EVEN_RATIO = 0.65;
const FEE_RATIO = 0.15;

export function decideProspect(expectedRoiPct: number): ProspectDecision {
  if (expectedRoiPct > 150) return "strong_buy";
  if (expectedRoiPct > 100) return "buy";
  if (expectedRoiPct > 50) return "maybe_worth_it";
  if (expectedRoiPct > 25) return "investigate";
  return "pass";
}

export function buildProspectAnalysis(
  analysis: AnalysisResult,
  categoryHint: string | null = null
): ProspectAnalysis {
  const marketPrice = analysis.realistic_price;
  const maxBuyPrice = marketPrice * MAX_BUY_RATIO;
  const targetBuyPrice = marketPrice * TARGET_BUY_RATIO;
  const breakEvenPrice = marketPrice * BREAK_EVEN_RATIO;

  const potentialProfit = marketPrice - maxBuyPrice - marketPrice * FEE_RATIO;
  const expectedRoiPct = maxBuyPrice > 0 ? (potentialProfit / maxBuyPrice) * 100 : 0;

  return {
    identification: analysis.identification,
    market_data: analysis.market_data,
    category_hint: categoryHint && categoryHint.trim() ? categoryHint.trim() : null,
    max_buy_price: maxBuyPrice,
    target_buy_price: targetBuyPrice,
    break_even_price: breakEvenPrice,
    potential_profit: potentialProfit,
    expected_roi_pct: expectedRoiPct,
    recommendation: decideProspect(expectedRoiPct),
    confidence: analysis.confidence,
    image_count: analysis.image_count,
  };
}
