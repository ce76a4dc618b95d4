/**
 * Dominant color detection.
 *
 * Each photo is averaged down to a single pixel and bucketed with fixed RGB
 * thresholds. Coarse on purpose: it feeds listing keywords, not colorway names.
 */

import sharp from "sharp";

export type ColorName = "Red" | "Green" | "Blue" | "White" | "Black" | "Mixed";

export function classifyColor(red: number, green: number, blue: number): ColorName {
  if (red > 200 && green < 100 && blue < 100) return "Red";
  if (red < 100 && green > 200 && blue < 100) return "Green";
  if (red < 100 && green < 100 && blue > 200) return "Blue";
  if (red > 200 && green > 200 && blue > 200) return "White";
  if (red < 50 && green < 50 && blue < 50) return "Black";
  return "Mixed";
}

export async function sampleAverageColor(image: Buffer): Promise<{ red: number; green: number; blue: number }> {
  const data = await sharp(image)
    .flatten({ background: { r: 0, g: 0, b: 0 } })
    .removeAlpha()
    .resize(1, 1, { fit: "fill" })
    .raw()
    .toBuffer();
  return { red: data[0], green: data[1], blue: data[2] };
}

export async function detectColors(images: Buffer[]): Promise<ColorName[]> {
  const samples = await Promise.all(
    images.map(async (image, index) => {
      try {
        const { red, green, blue } = await sampleAverageColor(image);
        return classifyColor(red, green, blue);
      } catch (error) {
        console.warn("COLOR_SAMPLE_FAILED", {
          index,
          error: error instanceof Error ? error.message : String(error),
        });
        return null;
      }
    })
  );

  const colors: ColorName[] = [];
  for (const color of samples) {
    if (color && !colors.includes(color)) colors.push(color);
  }
  return colors;
}
