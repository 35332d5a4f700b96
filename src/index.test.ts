import { describe, expect, it } from "vitest";
import * as api from "./index";

describe("library surface", () => {
  it("exports the generator, pipeline stages and helpers", () => {
    expect(typeof api.NoiseGenerator).toBe("function");
    expect(typeof api.createNoiseGenerator).toBe("function");
    expect(typeof api.generateWhiteNoise).toBe("function");
    expect(typeof api.generateSmoothNoise).toBe("function");
    expect(typeof api.generatePerlinNoise).toBe("function");
    expect(typeof api.interpolate).toBe("function");
    expect(typeof api.ConfigurationError).toBe("function");
  });

  it("leaves the Int16 file encoder to the export script", () => {
    expect("encodeGridToInt16" in api).toBe(false);
  });
});
