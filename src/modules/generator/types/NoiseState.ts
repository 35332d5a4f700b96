export type NoiseGrid = number[][]; // height rows x width cols, 0..1

export type NoiseSeed = string | number | Uint8Array;

export interface RandomSource {
  next(): number; // uniform 0..1 (exclusive)
}

export interface NoiseConfig {
  seed?: NoiseSeed;
  width?: number;   // 128
  height?: number;  // 128
  octave?: number;  // 1
  random?: RandomSource; // overrides seed
}
