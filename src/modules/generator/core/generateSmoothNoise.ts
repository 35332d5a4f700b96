import type { NoiseGrid } from "../types/NoiseState";
import { interpolate } from "../utils/interpolate";

export interface SampleAnchors {
  lower: number;
  upper: number; // wraps around the axis
  blend: number; // 0..1 (exclusive)
}

// 2^exponent mod modulus, without building 2^exponent (it overflows past 1023)
function powerOfTwoMod(exponent: number, modulus: number): number {
  let result = 1 % modulus;
  let base = 2 % modulus;
  let e = exponent;
  while (e > 0) {
    if (e % 2 === 1) result = (result * base) % modulus;
    base = (base * base) % modulus;
    e = Math.floor(e / 2);
  }
  return result;
}

export function sampleAnchors(
  index: number,
  octaveLevel: number,
  size: number
): SampleAnchors {
  const samplePeriod = 2 ** octaveLevel; // Infinity from level 1024

  if (samplePeriod > index) {
    return {
      lower: 0,
      upper: powerOfTwoMod(octaveLevel, size),
      blend: index / samplePeriod,
    };
  }

  const lower = Math.floor(index / samplePeriod) * samplePeriod;
  const upper = (lower + samplePeriod) % size;
  const blend = (index - lower) / samplePeriod;
  return { lower, upper, blend };
}

// Resamples base every 2^octaveLevel cells and blends between the samples.
// Anchors wrap at the edges so the result tiles. Shape comes from base; once
// the period covers an axis the anchors collapse and that axis goes flat.
export function generateSmoothNoise(base: NoiseGrid, octaveLevel: number): NoiseGrid {
  const height = base.length;
  const width = height > 0 ? (base[0] as number[]).length : 0;

  const columns = new Array<SampleAnchors>(width);
  for (let w = 0; w < width; w++) {
    columns[w] = sampleAnchors(w, octaveLevel, width);
  }

  const noise: NoiseGrid = [];

  for (let h = 0; h < height; h++) {
    const { lower: h0, upper: h1, blend: verticalBlend } = sampleAnchors(h, octaveLevel, height);
    const row0 = base[h0] as number[];
    const row1 = base[h1] as number[];

    const row = new Array<number>(width);
    for (let w = 0; w < width; w++) {
      const { lower: w0, upper: w1, blend: horizontalBlend } = columns[w] as SampleAnchors;

      const top = interpolate(row0[w0] as number, row1[w0] as number, horizontalBlend);
      const bottom = interpolate(row1[w1] as number, row0[w1] as number, horizontalBlend);

      row[w] = interpolate(top, bottom, verticalBlend);
    }
    noise.push(row);
  }

  return noise;
}
