/**
 * Photo analysis module
 *
 * Public entry points for item analysis, prospecting and the OCR/color helpers.
 */

export { AnalysisService, type AnalysisServiceOptions } from "./analysisService";
export { VisionAnalysisEngine, type VisionAnalysisEngineOptions } from "./visionAnalysisEngine";
export { AnalysisProgress, TOTAL_ANALYSIS_STEPS, type ProgressListener } from "./analysisProgress";
