/**
 * Image preparation for vision API calls.
 *
 * Photos are downscaled to fit 1024x1024 (aspect preserved, never enlarged)
 * and re-encoded as JPEG q80 before upload. Undecodable photos are dropped.
 */

import { createHash } from "crypto";
import sharp from "sharp";
import { BUSINESS_RULES } from "@/lib/config/resaleConfig";

export interface PreparedImage {
  base64: string;
  width: number;
  height: number;
  bytes: number;
}

/**
 * Target size for an image of the given dimensions (fit inside max x max).
 */
export function fitWithin(
  width: number,
  height: number,
  max: number = BUSINESS_RULES.max_image_dimension
): { width: number; height: number } {
  if (width <= max && height <= max) return { width, height };
  const ratio = Math.min(max / width, max / height);
  return {
    width: Math.max(1, Math.round(width * ratio)),
    height: Math.max(1, Math.round(height * ratio)),
  };
}

export async function prepareImageForAnalysis(image: Buffer): Promise<PreparedImage> {
  const max = BUSINESS_RULES.max_image_dimension;
  const { data, info } = await sharp(image)
    .rotate()
    .resize({ width: max, height: max, fit: "inside", withoutEnlargement: true })
    .jpeg({ quality: BUSINESS_RULES.jpeg_quality })
    .toBuffer({ resolveWithObject: true });

  return {
    base64: data.toString("base64"),
    width: info.width,
    height: info.height,
    bytes: info.size,
  };
}

export async function processImagesForAnalysis(images: Buffer[]): Promise<PreparedImage[]> {
  const limited = images.slice(0, BUSINESS_RULES.max_photos);
  const results = await Promise.all(
    limited.map(async (image, index) => {
      try {
        return await prepareImageForAnalysis(image);
      } catch (error) {
        console.warn("IMAGE_PREPARE_FAILED", {
          index,
          bytes: image.length,
          error: error instanceof Error ? error.message : String(error),
        });
        return null;
      }
    })
  );
  return results.filter((prepared): prepared is PreparedImage => prepared !== null);
}

/**
 * Stable cache key for a set of prepared photos (order-sensitive).
 */
export function hashPreparedImages(images: PreparedImage[]): string {
  const hash = createHash("sha256");
  for (const image of images) {
    hash.update(image.base64);
    hash.update("|");
  }
  return hash.digest("hex");
}
