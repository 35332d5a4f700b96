export { NoiseGenerator, createNoiseGenerator } from "./modules/generator/core/NoiseGenerator";
export type { CallableNoiseGenerator } from "./modules/generator/core/NoiseGenerator";
export { generateWhiteNoise } from "./modules/generator/core/generateWhiteNoise";
export { generateSmoothNoise, sampleAnchors } from "./modules/generator/core/generateSmoothNoise";
export type { SampleAnchors } from "./modules/generator/core/generateSmoothNoise";
export { generatePerlinNoise } from "./modules/generator/core/generatePerlinNoise";
export { interpolate } from "./modules/generator/utils/interpolate";
export { createSeededRandom } from "./modules/generator/utils/random";
export { ConfigurationError } from "./modules/generator/errors/ConfigurationError";
export {
  DEFAULT_WIDTH,
  DEFAULT_HEIGHT,
  DEFAULT_OCTAVE,
  PERSISTENCE,
} from "./modules/generator/config/defaults";
export type {
  NoiseConfig,
  NoiseGrid,
  NoiseSeed,
  RandomSource,
} from "./modules/generator/types/NoiseState";
