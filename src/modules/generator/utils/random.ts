import Alea from "alea";
import type { NoiseSeed, RandomSource } from "../types/NoiseState";

function seedToString(seed: string | number | Uint8Array): string | number {
  if (typeof seed === "string" || typeof seed === "number") return seed;
  let hex = "";
  for (const byte of seed) {
    hex += byte.toString(16).padStart(2, "0");
  }
  return "bytes:" + hex; // keep apart from the equivalent hex string
}

export function createSeededRandom(seed?: NoiseSeed): RandomSource {
  // No seed: alea falls back to the current time
  const rng = seed === undefined ? Alea() : Alea(seedToString(seed));
  return { next: () => rng() };
}
