import type { NoiseConfig, NoiseGrid, NoiseSeed, RandomSource } from "../types/NoiseState";
import { DEFAULT_HEIGHT, DEFAULT_OCTAVE, DEFAULT_WIDTH } from "../config/defaults";
import { ConfigurationError } from "../errors/ConfigurationError";
import { createSeededRandom } from "../utils/random";
import { interpolate } from "../utils/interpolate";
import { generateWhiteNoise } from "./generateWhiteNoise";
import { generatePerlinNoise } from "./generatePerlinNoise";

function requirePositiveInteger(field: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(field, value);
  }
  return value;
}

// Each generate() keeps drawing from the same source: successive calls differ,
// but two instances with the same seed and size yield the same grids
export class NoiseGenerator {
  static readonly interpolate = interpolate;

  readonly width: number;
  readonly height: number;
  readonly octave: number;

  private random: RandomSource;

  constructor(config: NoiseConfig = {}) {
    this.width = requirePositiveInteger("width", config.width ?? DEFAULT_WIDTH);
    this.height = requirePositiveInteger("height", config.height ?? DEFAULT_HEIGHT);
    this.octave = requirePositiveInteger("octave", config.octave ?? DEFAULT_OCTAVE);
    this.random = config.random ?? createSeededRandom(config.seed);
  }

  // height x width, 0..1
  generate(): NoiseGrid {
    const base = generateWhiteNoise(this.width, this.height, this.random);
    return generatePerlinNoise(base, this.octave);
  }

  // No seed: clock-seeded
  reseed(seed?: NoiseSeed): void {
    this.random = createSeededRandom(seed);
  }
}

export interface CallableNoiseGenerator {
  (): NoiseGrid;
  readonly width: number;
  readonly height: number;
  readonly octave: number;
  generate(): NoiseGrid;
  reseed(seed?: NoiseSeed): void;
}

// Generator that can also be invoked directly: createNoiseGenerator(cfg)()
export function createNoiseGenerator(config: NoiseConfig = {}): CallableNoiseGenerator {
  const generator = new NoiseGenerator(config);
  const generate = (): NoiseGrid => generator.generate();

  return Object.assign(generate, {
    width: generator.width,
    height: generator.height,
    octave: generator.octave,
    generate,
    reseed: (seed?: NoiseSeed): void => generator.reseed(seed),
  });
}
