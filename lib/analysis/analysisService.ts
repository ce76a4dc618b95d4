/**
 * Analysis service facade
 *
 * Single entry point for the app: republishes the engine's progress, accepts
 * photos in any supported form, and exposes the OCR/color helpers and the
 * market, authentication and pricing builders. Every method resolves; an
 * empty photo list resolves to null (or []) without any provider call.
 */

import { AnalysisError, toAnalysisError } from "@/lib/errors/analysisError";
import { normalizeImageInputs, type ImageInput } from "@/lib/images/imageInput";
import { processImagesForAnalysis, type PreparedImage } from "@/lib/images/prepareImages";
import { logAnalysisEvent } from "@/lib/logging/analysisLogging";
import { authenticateProduct } from "@/lib/authentication/authenticateProduct";
import { getMarketIntelligence } from "@/lib/market/marketIntelligence";
import { getPricingRecommendations } from "@/lib/pricing/pricingIntelligence";
import { calculateRoi } from "@/lib/pricing/roi";
import { detectColors, type ColorName } from "@/lib/vision/colorDetection";
import { detectBrands, extractTextFromImages } from "@/lib/vision/textExtraction";
import { GoogleVisionTextRecognizer, type TextRecognizer } from "@/lib/vision/textRecognition";
import type {
  AnalysisProgressState,
  AnalysisResult,
  PrecisionIdentificationResult,
  ProspectAnalysis,
} from "@/types/analysis";
import type {
  AuthenticationResult,
  ItemCondition,
  MarketData,
  MarketIntelligence,
  PricingIntelligence,
  RoiCalculation,
} from "@/types/market";
import { AnalysisProgress, type ProgressListener } from "./analysisProgress";
import { VisionAnalysisEngine } from "./visionAnalysisEngine";

export interface AnalysisServiceOptions {
  engine?: VisionAnalysisEngine;
  recognizer?: TextRecognizer;
}

export class AnalysisService {
  readonly progress = new AnalysisProgress();

  private readonly engine: VisionAnalysisEngine;
  private readonly recognizerOverride: TextRecognizer | undefined;
  private readonly unbindProgress: () => void;

  constructor(options: AnalysisServiceOptions = {}) {
    this.engine = options.engine ?? new VisionAnalysisEngine();
    this.recognizerOverride = options.recognizer;
    this.unbindProgress = this.progress.bindTo(this.engine.progress);
    console.log("ANALYSIS_SERVICE_READY");
  }

  get state(): AnalysisProgressState {
    return this.progress.snapshot;
  }

  subscribe(listener: ProgressListener): () => void {
    return this.progress.subscribe(listener);
  }

  /** Stop mirroring engine progress (for short-lived services in scripts/tests). */
  dispose(): void {
    this.unbindProgress();
  }

  async analyzeItem(images: ImageInput[]): Promise<AnalysisResult | null> {
    const buffers = await this.loadImages("analyze_item", images);
    if (!buffers) return null;
    return this.engine.analyzeItem(buffers);
  }

  async analyzeForProspecting(images: ImageInput[], category: string): Promise<ProspectAnalysis | null> {
    const buffers = await this.loadImages("analyze_for_prospecting", images);
    if (!buffers) return null;
    return this.engine.analyzeForProspecting(buffers, category);
  }

  async analyzeBarcode(barcode: string, images: ImageInput[]): Promise<AnalysisResult | null> {
    const buffers = await this.loadImages("analyze_barcode", images);
    if (!buffers) return null;
    return this.engine.analyzeBarcode(barcode, buffers);
  }

  async lookupBarcode(barcode: string): Promise<AnalysisResult | null> {
    return this.engine.lookupBarcode(barcode);
  }

  async lookupBarcodeForProspecting(barcode: string): Promise<ProspectAnalysis | null> {
    return this.engine.lookupBarcodeForProspecting(barcode);
  }

  async processImagesForAnalysis(images: ImageInput[]): Promise<PreparedImage[]> {
    const buffers = await normalizeImageInputs(images);
    return processImagesForAnalysis(buffers);
  }

  async extractTextFromImages(images: ImageInput[]): Promise<string[]> {
    const buffers = await normalizeImageInputs(images);
    if (buffers.length === 0) return [];
    return extractTextFromImages(buffers, this.recognizer());
  }

  async detectBrands(images: ImageInput[]): Promise<string[]> {
    const buffers = await normalizeImageInputs(images);
    if (buffers.length === 0) return [];
    return detectBrands(buffers, this.recognizer());
  }

  async detectColors(images: ImageInput[]): Promise<ColorName[]> {
    const buffers = await normalizeImageInputs(images);
    return detectColors(buffers);
  }

  getMarketIntelligence(product: string): MarketIntelligence {
    return getMarketIntelligence(product);
  }

  authenticateProduct(images: ImageInput[], productInfo: PrecisionIdentificationResult): AuthenticationResult {
    return authenticateProduct(images.length, productInfo);
  }

  getPricingRecommendations(
    product: PrecisionIdentificationResult,
    condition: ItemCondition,
    marketData: MarketData
  ): PricingIntelligence {
    return getPricingRecommendations(product, condition, marketData);
  }

  calculateRoi(itemCost: number, sellingPrice: number): RoiCalculation {
    return calculateRoi(itemCost, sellingPrice);
  }

  /**
   * Report a failure the way the analysis methods do: log, flag progress, resolve null.
   */
  handleAnalysisError(error: unknown, operation = "analysis"): null {
    const analysisError = toAnalysisError(error);
    logAnalysisEvent({
      event_type: "ANALYSIS_ERROR",
      operation,
      error_code: analysisError.code,
      error: analysisError.message,
    });
    this.progress.fail(analysisError.message);
    return null;
  }

  private async loadImages(operation: string, images: ImageInput[]): Promise<Buffer[] | null> {
    if (images.length === 0) {
      return this.handleAnalysisError(AnalysisError.noImages(), operation);
    }
    const buffers = await normalizeImageInputs(images);
    if (buffers.length === 0) {
      return this.handleAnalysisError(AnalysisError.noImages(), operation);
    }
    return buffers;
  }

  private recognizer(): TextRecognizer {
    return this.recognizerOverride ?? new GoogleVisionTextRecognizer();
  }
}
