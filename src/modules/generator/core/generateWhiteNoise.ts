import type { NoiseGrid, RandomSource } from "../types/NoiseState";

// Raw draws row by row; consumes exactly width * height values
export function generateWhiteNoise(
  width: number,
  height: number,
  random: RandomSource
): NoiseGrid {
  const noise: NoiseGrid = [];

  for (let h = 0; h < height; h++) {
    const row = new Array<number>(width);
    for (let w = 0; w < width; w++) {
      row[w] = random.next();
    }
    noise.push(row);
  }

  return noise;
}
