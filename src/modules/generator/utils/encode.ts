import type { NoiseGrid } from "../types/NoiseState";

// Row-major Int16 dump, 0..1 -> 0..32767
export function encodeGridToInt16(grid: NoiseGrid): Int16Array {
  const height = grid.length;
  const width = height > 0 ? (grid[0] as number[]).length : 0;
  const arr = new Int16Array(width * height);

  for (let h = 0; h < height; h++) {
    const row = grid[h] as number[];
    for (let w = 0; w < width; w++) {
      let v = row[w] ?? 0;
      if (v < 0) v = 0;
      if (v > 1) v = 1;
      arr[h * width + w] = Math.round(v * 32767);
    }
  }

  return arr;
}
