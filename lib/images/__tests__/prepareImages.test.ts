import { describe, it, expect, vi } from "vitest";
import sharp from "sharp";
import {
  fitWithin,
  hashPreparedImages,
  prepareImageForAnalysis,
  processImagesForAnalysis,
} from "@/lib/images/prepareImages";

function blank(width: number, height: number): Promise<Buffer> {
  return sharp({ create: { width, height, channels: 3, background: { r: 90, g: 120, b: 200 } } })
    .png()
    .toBuffer();
}

describe("fitWithin", () => {
  it("scales down to fit the 1024 box, keeping aspect ratio", () => {
    expect(fitWithin(2000, 500)).toEqual({ width: 1024, height: 256 });
    expect(fitWithin(3000, 4000)).toEqual({ width: 768, height: 1024 });
  });

  it("never enlarges", () => {
    expect(fitWithin(800, 600)).toEqual({ width: 800, height: 600 });
  });
});

describe("prepareImageForAnalysis", () => {
  it("downscales large photos and re-encodes as JPEG", async () => {
    const prepared = await prepareImageForAnalysis(await blank(2048, 1024));

    expect(prepared.width).toBe(1024);
    expect(prepared.height).toBe(512);
    const bytes = Buffer.from(prepared.base64, "base64");
    expect(bytes.length).toBe(prepared.bytes);
    expect([bytes[0], bytes[1]]).toEqual([0xff, 0xd8]);
  });

  it("keeps small photos at their size", async () => {
    const prepared = await prepareImageForAnalysis(await blank(300, 200));
    expect({ width: prepared.width, height: prepared.height }).toEqual({ width: 300, height: 200 });
  });
});

describe("processImagesForAnalysis", () => {
  it("caps the batch at eight photos", async () => {
    const image = await blank(16, 16);
    const prepared = await processImagesForAnalysis(Array.from({ length: 10 }, () => image));
    expect(prepared).toHaveLength(8);
  });

  it("drops photos that cannot be decoded", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const prepared = await processImagesForAnalysis([Buffer.from("garbage"), await blank(16, 16)]);

    expect(prepared).toHaveLength(1);
    expect(warn).toHaveBeenCalledWith("IMAGE_PREPARE_FAILED", expect.objectContaining({ index: 0, bytes: 7 }));
  });
});

describe("hashPreparedImages", () => {
  it("is stable and order-sensitive", () => {
    const a = { base64: "AAAA", width: 1, height: 1, bytes: 3 };
    const b = { base64: "BBBB", width: 1, height: 1, bytes: 3 };

    expect(hashPreparedImages([a, b])).toBe(hashPreparedImages([a, b]));
    expect(hashPreparedImages([a, b])).not.toBe(hashPreparedImages([b, a]));
    expect(hashPreparedImages([a])).toMatch(/^[0-9a-f]{64}$/);
  });
});
