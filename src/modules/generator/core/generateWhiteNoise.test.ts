import { describe, expect, it } from "vitest";
import { generateWhiteNoise } from "./generateWhiteNoise";
import { sequenceRandom } from "../testing/sequenceRandom";

describe("generateWhiteNoise", () => {
  it("fills rows left to right, top to bottom", () => {
    const random = sequenceRandom([0, 0.1, 0.2, 0.3, 0.4, 0.5]);
    expect(generateWhiteNoise(3, 2, random)).toEqual([
      [0, 0.1, 0.2],
      [0.3, 0.4, 0.5],
    ]);
  });

  it("consumes exactly width * height draws", () => {
    const random = sequenceRandom([0.5]);
    generateWhiteNoise(7, 5, random);
    expect(random.draws).toBe(35);
  });

  it("stores draws unchanged", () => {
    const random = sequenceRandom([0.999999, 0]);
    expect(generateWhiteNoise(2, 1, random)).toEqual([[0.999999, 0]]);
  });
});
