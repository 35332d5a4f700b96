import { mkdirSync, writeFileSync } from "fs";
import { NoiseGenerator } from "../modules/generator/core/NoiseGenerator";
import { ConfigurationError } from "../modules/generator/errors/ConfigurationError";
import { encodeGridToInt16 } from "../modules/generator/utils/encode";
import {
  DEFAULT_HEIGHT,
  DEFAULT_OCTAVE,
  DEFAULT_WIDTH,
} from "../modules/generator/config/defaults";

// usage: generate-noise [seed] [width] [height] [octave]
const [cliSeed, cliWidth, cliHeight, cliOctave] = process.argv.slice(2);
const randomSeed =
  Date.now().toString(36) + "_" + Math.random().toString(36).slice(2, 8);
const seed = cliSeed ?? randomSeed;

function numberArg(arg: string | undefined, fallback: number): number {
  return arg === undefined ? fallback : Number(arg);
}

try {
  const generator = new NoiseGenerator({
    seed,
    width: numberArg(cliWidth, DEFAULT_WIDTH),
    height: numberArg(cliHeight, DEFAULT_HEIGHT),
    octave: numberArg(cliOctave, DEFAULT_OCTAVE),
  });

  const grid = generator.generate();

  mkdirSync("data", { recursive: true });
  writeFileSync("data/noise.bin", Buffer.from(encodeGridToInt16(grid).buffer));
  writeFileSync("data/seed.txt", seed, "utf8");

  console.log(
    `Noise generated (${generator.width}x${generator.height}, octave ${generator.octave}) with seed:`,
    seed
  );
} catch (err) {
  if (!(err instanceof ConfigurationError)) throw err;
  console.error(err.message);
  process.exitCode = 1;
}
