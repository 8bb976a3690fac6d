import { describe, expect, it } from "vitest";
import { registerValues, toHexByte } from "./registers";
import { findBest } from "./select";
import { search } from "./timing";

const configFor = (baudRate: number, cpuFrequency: number) => {
  const config = findBest(baudRate, cpuFrequency);
  if (!config) {
    throw new Error(`no configuration for ${baudRate} @ ${cpuFrequency}`);
  }
  return config;
};

describe("registerValues", () => {
  it("packs segments into CANBT1..3", () => {
    expect(registerValues(configFor(100000, 16000000))).toEqual({
      canbt1: 0x1e,
      canbt2: 0x08,
      canbt3: 0x12,
    });
  });

  it("packs the largest prescaler", () => {
    const values = registerValues(configFor(10000, 6400000));
    expect(values.canbt1).toBe(0x7e);
  });

  it("packs Tbit 15 segments", () => {
    const tq15 = search(100000, 18000000)[2];
    expect(tq15.timeQuantaPerBit).toBe(15);
    expect(registerValues(tq15)).toEqual({ canbt1: 0x16, canbt2: 0x0c, canbt3: 0x26 });
  });
});

describe("toHexByte", () => {
  it("pads to two digits", () => {
    expect(toHexByte(0x08)).toBe("0x08");
    expect(toHexByte(0x7e)).toBe("0x7e");
  });
});
