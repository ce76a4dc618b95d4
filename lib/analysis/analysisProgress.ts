/**
 * Observable analysis progress.
 *
 * Holds { is_analyzing, progress_message, current_step, total_steps } and
 * emits "change" with a snapshot on every update. A second instance can
 * mirror this one via bindTo(), which is how the service facade republishes
 * the engine's progress.
 */

import { EventEmitter } from "node:events";
import type { AnalysisProgressState } from "@/types/analysis";

export const TOTAL_ANALYSIS_STEPS = 8;

export type AnalysisStage = "processing_images" | "identifying" | "researching_market" | "finalizing";

const STAGE_STEPS: Record<AnalysisStage, { step: number; message: string }> = {
  processing_images: { step: 1, message: "Processing images..." },
  identifying: { step: 2, message: "Identifying product with AI vision..." },
  researching_market: { step: 3, message: "Researching market prices..." },
  finalizing: { step: 7, message: "Finalizing analysis..." },
};

export type ProgressListener = (state: AnalysisProgressState) => void;

export function initialProgressState(): AnalysisProgressState {
  return {
    is_analyzing: false,
    progress_message: "Ready",
    current_step: 0,
    total_steps: TOTAL_ANALYSIS_STEPS,
  };
}

export class AnalysisProgress {
  private readonly emitter = new EventEmitter();
  private state: AnalysisProgressState = initialProgressState();

  get snapshot(): AnalysisProgressState {
    return { ...this.state };
  }

  subscribe(listener: ProgressListener): () => void {
    this.emitter.on("change", listener);
    return () => {
      this.emitter.off("change", listener);
    };
  }

  update(patch: Partial<AnalysisProgressState>): void {
    this.state = { ...this.state, ...patch };
    this.emitter.emit("change", this.snapshot);
  }

  start(message = "Starting analysis..."): void {
    this.update({ is_analyzing: true, current_step: 0, progress_message: message });
  }

  mark(stage: AnalysisStage): void {
    const { step, message } = STAGE_STEPS[stage];
    this.update({ current_step: step, progress_message: message });
  }

  complete(message = "Analysis complete!"): void {
    this.update({ is_analyzing: false, progress_message: message });
  }

  fail(message: string): void {
    this.update({ is_analyzing: false, progress_message: `Analysis failed: ${message}` });
  }

  /**
   * Mirror another progress source. Returns the unbind function.
   */
  bindTo(source: AnalysisProgress): () => void {
    this.update(source.snapshot);
    return source.subscribe((state) => this.update(state));
  }
}
