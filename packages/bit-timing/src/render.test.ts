import { describe, expect, it } from "vitest";
import { renderDetails, renderEvaluation, renderRegisters, renderSummary } from "./render";
import { findBest } from "./select";
import { evaluate } from "./timing";

const config = findBest(100000, 16000000);

describe("renderSummary", () => {
  it("prints frequency, baud rate and error rate", () => {
    expect(config).not.toBeNull();
    if (!config) return;
    expect(renderSummary(config)).toBe(
      "CPU frequency 16000000 hz, CAN baudrate 100000 bps, error rate: 0%"
    );
  });
});

describe("renderDetails", () => {
  it("lists the segmentation", () => {
    if (!config) throw new Error("missing configuration");
    expect(renderDetails(config)).toBe(
      [
        "Config at Time Quantum = 1",
        "\tPrescaler: 16",
        "\tTbit: 10",
        "\tSync: 1",
        "\tPropagation segment: 5",
        "\tPhase Segment 1: 2",
        "\tPhase Segment 2: 2",
        "\tSJW: 1",
      ].join("\n")
    );
  });
});

describe("renderRegisters", () => {
  it("prints the packed register bytes", () => {
    if (!config) throw new Error("missing configuration");
    expect(renderRegisters(config)).toBe("Registers: CANBT1=0x1e CANBT2=0x08 CANBT3=0x12");
  });
});

describe("renderEvaluation", () => {
  it("prints one line per Tbit with its outcome", () => {
    const lines = renderEvaluation(evaluate(100000, 16000000)).split("\n");
    expect(lines).toHaveLength(18);
    expect(lines[0]).toBe("Tbit  8: prescaler=20 segments=1+4+3+2 error=0 rejected (segment_sum)");
    expect(lines[2]).toBe("Tbit 10: prescaler=16 segments=1+5+2+2 error=0 ok");
    expect(lines[17]).toBe(
      "Tbit 25: prescaler=6 segments=1+12+6+6 error=10 rejected (prop_segment_range)"
    );
  });
});
