import { describe, it, expect, vi } from "vitest";
import { AnalysisProgress, TOTAL_ANALYSIS_STEPS } from "@/lib/analysis/analysisProgress";

describe("AnalysisProgress", () => {
  it("starts idle", () => {
    expect(new AnalysisProgress().snapshot).toEqual({
      is_analyzing: false,
      progress_message: "Ready",
      current_step: 0,
      total_steps: TOTAL_ANALYSIS_STEPS,
    });
  });

  it("moves through the analysis stages", () => {
    const progress = new AnalysisProgress();
    const steps: number[] = [];
    progress.subscribe((state) => steps.push(state.current_step));

    progress.start();
    expect(progress.snapshot.is_analyzing).toBe(true);
    progress.mark("processing_images");
    progress.mark("identifying");
    progress.mark("researching_market");
    progress.mark("finalizing");
    progress.complete();

    expect(steps).toEqual([0, 1, 2, 3, 7, 7]);
    expect(progress.snapshot.is_analyzing).toBe(false);
    expect(progress.snapshot.progress_message).toBe("Analysis complete!");
  });

  it("clears the analyzing flag on failure", () => {
    const progress = new AnalysisProgress();
    progress.start();
    progress.fail("Analysis timed out");

    expect(progress.snapshot.is_analyzing).toBe(false);
    expect(progress.snapshot.progress_message).toBe("Analysis failed: Analysis timed out");
  });

  it("stops notifying after unsubscribe", () => {
    const progress = new AnalysisProgress();
    const listener = vi.fn();
    const unsubscribe = progress.subscribe(listener);

    progress.start();
    unsubscribe();
    progress.complete();

    expect(listener).toHaveBeenCalledTimes(1);
  });

  it("mirrors another source until unbound", () => {
    const source = new AnalysisProgress();
    source.start("Looking up barcode...");
    const mirror = new AnalysisProgress();

    const unbind = mirror.bindTo(source);
    expect(mirror.snapshot.progress_message).toBe("Looking up barcode...");

    source.mark("researching_market");
    expect(mirror.snapshot.current_step).toBe(3);

    unbind();
    source.complete();
    expect(mirror.snapshot.progress_message).toBe("Researching market prices...");
  });

  it("returns copies from snapshot", () => {
    const progress = new AnalysisProgress();
    const snapshot = progress.snapshot;
    snapshot.progress_message = "changed";
    expect(progress.snapshot.progress_message).toBe("Ready");
  });
});
