/**
 * Vision analysis engine
 *
 * Photos -> prepared JPEGs -> OpenAI identification (cached) -> market data
 * (provider, else estimated) -> AnalysisResult. Progress is published through
 * `progress`. Public methods never throw; failures resolve to null.
 */

import { randomUUID } from "crypto";
import { getResaleConfig, type ResaleConfig } from "@/lib/config/resaleConfig";
import { AnalysisCache } from "@/lib/cache/analysisCache";
import { AnalysisError, toAnalysisError } from "@/lib/errors/analysisError";
import {
  hashPreparedImages,
  processImagesForAnalysis,
  type PreparedImage,
} from "@/lib/images/prepareImages";
import { logAnalysisEvent } from "@/lib/logging/analysisLogging";
import {
  buildAnalysisFromMarketData,
  createFallbackMarketData,
  type FallbackOptions,
} from "@/lib/market/fallbackAnalysis";
import { EstimatedMarketResearch, type MarketResearchProvider } from "@/lib/market/marketResearch";
import {
  createBarcodeIdentification,
  createFallbackIdentification,
  parseIdentification,
  PARTIAL_IDENTIFICATION_DETAIL,
} from "@/lib/openai/identificationParser";
import {
  IDENTIFICATION_SYSTEM_PROMPT,
  IDENTIFICATION_USER_PROMPT,
  buildProspectingUserPrompt,
} from "@/lib/openai/prompts";
import { requestVisionCompletion } from "@/lib/openai/visionClient";
import { buildProspectAnalysis } from "@/lib/prospecting/prospectAnalysis";
import { buildUsageIdempotencyKey, logUsageEvent } from "@/lib/usage/logUsageEvent";
import type {
  AnalysisResult,
  PrecisionIdentificationResult,
  ProspectAnalysis,
} from "@/types/analysis";
import type { ItemCondition, MarketData } from "@/types/market";
import { AnalysisProgress } from "./analysisProgress";

const RESEARCH_CONDITION: ItemCondition = "Good";

export interface VisionAnalysisEngineOptions {
  config?: () => ResaleConfig;
  marketResearch?: MarketResearchProvider;
  cache?: AnalysisCache;
  fallback?: FallbackOptions;
}

interface IdentifyRequest {
  operation: string;
  userPrompt: string;
  prepared: PreparedImage[];
  runId: string;
}

export class VisionAnalysisEngine {
  readonly progress = new AnalysisProgress();

  private readonly getConfig: () => ResaleConfig;
  private readonly marketResearch: MarketResearchProvider;
  private readonly cacheOverride: AnalysisCache | undefined;
  private readonly fallback: FallbackOptions;
  private cache: AnalysisCache | null = null;

  constructor(options: VisionAnalysisEngineOptions = {}) {
    this.getConfig = options.config ?? getResaleConfig;
    this.fallback = options.fallback ?? {};
    this.marketResearch = options.marketResearch ?? new EstimatedMarketResearch(this.fallback);
    this.cacheOverride = options.cache;
  }

  async analyzeItem(images: Buffer[]): Promise<AnalysisResult | null> {
    return this.runImageAnalysis("analyze_item", IDENTIFICATION_USER_PROMPT, images);
  }

  async analyzeForProspecting(images: Buffer[], category: string): Promise<ProspectAnalysis | null> {
    const analysis = await this.runImageAnalysis(
      `prospect:${category.trim().toLowerCase() || "any"}`,
      buildProspectingUserPrompt(category),
      images
    );
    return analysis ? buildProspectAnalysis(analysis, category) : null;
  }

  /**
   * Barcode plus photos: the barcode is attached to the identification as the
   * style code when the model did not read one itself.
   */
  async analyzeBarcode(barcode: string, images: Buffer[]): Promise<AnalysisResult | null> {
    const code = barcode.trim();
    const analysis = await this.runImageAnalysis("analyze_barcode", IDENTIFICATION_USER_PROMPT, images, {
      barcode: code,
    });
    if (!analysis || !code || analysis.identification.style_code) return analysis;

    return {
      ...analysis,
      identification: {
        ...analysis.identification,
        style_code: code,
        identification_details: [...analysis.identification.identification_details, `Barcode: ${code}`],
      },
    };
  }

  /**
   * Barcode-only lookup; no photos and no vision call.
   */
  async lookupBarcode(barcode: string): Promise<AnalysisResult | null> {
    const code = barcode.trim();
    if (!code) {
      console.warn("BARCODE_LOOKUP_EMPTY");
      return null;
    }
    logAnalysisEvent({ event_type: "ANALYSIS_START", operation: "lookup_barcode", detail: { barcode: code } });

    this.progress.start("Looking up barcode...");
    const identification = createBarcodeIdentification(code);
    this.progress.mark("researching_market");
    const marketData = await this.researchMarket(identification);
    this.progress.mark("finalizing");
    const result = buildAnalysisFromMarketData(identification, marketData, 0, this.now());
    this.progress.complete();
    return result;
  }

  async lookupBarcodeForProspecting(barcode: string): Promise<ProspectAnalysis | null> {
    const analysis = await this.lookupBarcode(barcode);
    return analysis ? buildProspectAnalysis(analysis) : null;
  }

  private async runImageAnalysis(
    operation: string,
    userPrompt: string,
    images: Buffer[],
    startDetail: Record<string, unknown> = {}
  ): Promise<AnalysisResult | null> {
    if (images.length === 0) {
      console.warn("ANALYSIS_SKIPPED_NO_IMAGES", { operation });
      return null;
    }

    const config = this.getConfig();
    if (!config.openai_api_key) {
      return this.fail(operation, AnalysisError.apiKeyMissing());
    }

    const runId = randomUUID();
    const startedAt = Date.now();
    logAnalysisEvent({ event_type: "ANALYSIS_START", operation, image_count: images.length, detail: { ...startDetail, run_id: runId } });

    try {
      this.progress.start();
      this.progress.mark("processing_images");
      const prepared = await processImagesForAnalysis(images);
      if (prepared.length === 0) {
        throw AnalysisError.parse("none of the photos could be decoded");
      }

      this.progress.mark("identifying");
      const identification = await this.identify({ operation, userPrompt, prepared, runId });

      this.progress.mark("researching_market");
      const marketData = await this.researchMarket(identification);

      this.progress.mark("finalizing");
      const result = buildAnalysisFromMarketData(identification, marketData, prepared.length, this.now());

      this.progress.complete();
      logAnalysisEvent({
        event_type: "ANALYSIS_COMPLETE",
        operation,
        image_count: prepared.length,
        duration_ms: Date.now() - startedAt,
        detail: {
          run_id: runId,
          model: identification.exact_model_name,
          confidence: identification.confidence,
          realistic_price: Number(result.realistic_price.toFixed(2)),
        },
      });
      return result;
    } catch (error) {
      return this.fail(operation, toAnalysisError(error));
    }
  }

  private async identify(request: IdentifyRequest): Promise<PrecisionIdentificationResult> {
    const { operation, userPrompt, prepared, runId } = request;
    const imagesHash = hashPreparedImages(prepared);
    const cache = this.getCache();

    const cached = await cache.get({ imagesHash, operation });
    if (cached) {
      await logUsageEvent({
        provider: "cache",
        operation,
        cache_status: "hit",
        images_hash: imagesHash,
        image_count: prepared.length,
        success: true,
        idempotency_key: buildUsageIdempotencyKey({ runId, provider: "cache", operation, imagesHash, cache_status: "hit" }),
      });
      return cached;
    }

    const startedAt = Date.now();
    let content: string;
    try {
      content = await requestVisionCompletion({
        operation,
        system: IDENTIFICATION_SYSTEM_PROMPT,
        user: userPrompt,
        images: prepared,
        config: this.getConfig(),
      });
    } catch (error) {
      const analysisError = toAnalysisError(error);
      await this.logOpenAiUsage(runId, operation, imagesHash, prepared.length, startedAt, analysisError.code);
      // A response we could not read still yields a low-confidence analysis
      if (analysisError.code === "parse_error") return createFallbackIdentification();
      throw analysisError;
    }
    await this.logOpenAiUsage(runId, operation, imagesHash, prepared.length, startedAt, null);

    const identification = parseIdentification(content);
    if (identification.identification_details.includes(PARTIAL_IDENTIFICATION_DETAIL)) {
      // Not cached, so a later run can still get a clean answer
      console.warn("IDENTIFICATION_PARTIAL", { operation, content_preview: content.slice(0, 200) });
      return identification;
    }

    await cache.set({ imagesHash, operation }, identification);
    return identification;
  }

  private async researchMarket(identification: PrecisionIdentificationResult): Promise<MarketData> {
    try {
      const data = await this.marketResearch.researchProduct(identification, RESEARCH_CONDITION);
      if (data) return data;
      console.log("MARKET_RESEARCH_EMPTY", { provider: this.marketResearch.name, model: identification.exact_model_name });
    } catch (error) {
      console.warn("MARKET_RESEARCH_FAILED", {
        provider: this.marketResearch.name,
        error: error instanceof Error ? error.message : String(error),
      });
    }
    return createFallbackMarketData(identification, this.fallback);
  }

  private async logOpenAiUsage(
    runId: string,
    operation: string,
    imagesHash: string,
    imageCount: number,
    startedAt: number,
    errorCode: string | null
  ): Promise<void> {
    await logUsageEvent({
      provider: "openai",
      operation,
      cache_status: "miss",
      images_hash: imagesHash,
      image_count: imageCount,
      duration_ms: Date.now() - startedAt,
      success: errorCode === null,
      error_code: errorCode,
      idempotency_key: buildUsageIdempotencyKey({ runId, provider: "openai", operation, imagesHash, cache_status: "miss" }),
    });
  }

  private fail(operation: string, error: AnalysisError): null {
    logAnalysisEvent({
      event_type: "ANALYSIS_ERROR",
      operation,
      error_code: error.code,
      error: error.message,
    });
    this.progress.fail(error.message);
    return null;
  }

  private getCache(): AnalysisCache {
    if (this.cacheOverride) return this.cacheOverride;
    if (!this.cache) this.cache = new AnalysisCache();
    return this.cache;
  }

  private now(): Date {
    return this.fallback.now ? this.fallback.now() : new Date();
  }
}
