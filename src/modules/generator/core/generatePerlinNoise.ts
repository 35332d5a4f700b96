import type { NoiseGrid } from "../types/NoiseState";
import { PERSISTENCE } from "../config/defaults";
import { generateSmoothNoise } from "./generateSmoothNoise";

// Blend octaveCount smoothed copies of base, halving the weight each level,
// then normalize by the total weight (0..1 in -> 0..1 out)
export function generatePerlinNoise(base: NoiseGrid, octaveCount: number): NoiseGrid {
  const height = base.length;
  const width = height > 0 ? (base[0] as number[]).length : 0;

  // Each level reads base only
  const smooth: NoiseGrid[] = [];
  for (let o = 0; o < octaveCount; o++) {
    smooth.push(generateSmoothNoise(base, o));
  }

  const noise: NoiseGrid = [];
  for (let h = 0; h < height; h++) {
    noise.push(new Array<number>(width).fill(0));
  }

  let amplitude = 1;
  let totalAmplitude = 0;

  for (let o = 0; o < octaveCount; o++) {
    amplitude *= PERSISTENCE;
    totalAmplitude += amplitude;

    const level = smooth[o] as NoiseGrid;
    for (let h = 0; h < height; h++) {
      const acc = noise[h] as number[];
      const src = level[h] as number[];
      for (let w = 0; w < width; w++) {
        acc[w] = (acc[w] as number) + (src[w] as number) * amplitude;
      }
    }
  }

  // Normalize
  for (const row of noise) {
    for (let w = 0; w < width; w++) {
      row[w] = (row[w] as number) / totalAmplitude;
    }
  }

  return noise;
}
