import { describe, expect, it, vi } from "vitest";
import type { CliOptions } from "./args";
import { EXIT_INVALID, EXIT_NO_CONFIGURATION, EXIT_OK, runCli, type CliIo } from "./cli";

const createIo = () => {
  const out: string[] = [];
  const err: string[] = [];
  const files = new Map<string, string>();
  const saveDefaults = vi.fn(async () => "/tmp/can-timing/config.json");
  const io: CliIo = {
    stdout: (text) => out.push(text),
    stderr: (text) => err.push(text),
    writeFile: async (filePath, content) => {
      files.set(filePath, content);
    },
    saveDefaults,
    now: () => new Date("2026-01-02T03:04:05.000Z"),
  };
  return { io, out, err, files, saveDefaults };
};

const options = (overrides: Partial<CliOptions> = {}): CliOptions => ({
  cpuFrequency: 16000000,
  baudRates: [100000],
  showConfig: false,
  header: false,
  headerName: "can_baud",
  explain: false,
  json: false,
  saveDefaults: false,
  ...overrides,
});

const SUMMARY_100K = "CPU frequency 16000000 hz, CAN baudrate 100000 bps, error rate: 0%";

describe("runCli", () => {
  it("prints the summary of the best configuration", async () => {
    const { io, out, err } = createIo();
    await expect(runCli(options(), io)).resolves.toBe(EXIT_OK);
    expect(out).toEqual([SUMMARY_100K]);
    expect(err).toEqual([]);
  });

  it("adds the segmentation with --config", async () => {
    const { io, out } = createIo();
    await runCli(options({ showConfig: true }), io);
    expect(out).toHaveLength(3);
    expect(out[1].split("\n")[0]).toBe("Config at Time Quantum = 1");
    expect(out[2]).toBe("Registers: CANBT1=0x1e CANBT2=0x08 CANBT3=0x12");
  });

  it("keeps going when a baud rate has no configuration", async () => {
    const { io, out, err } = createIo();
    await expect(runCli(options({ baudRates: [500000, 100000] }), io)).resolves.toBe(
      EXIT_NO_CONFIGURATION
    );
    expect(out).toEqual([SUMMARY_100K]);
    expect(err).toEqual(["[can-timing] no valid configuration for 500000 bps at 16000000 hz"]);
  });

  it("reports invalid baud rates", async () => {
    const { io, err } = createIo();
    await expect(runCli(options({ baudRates: [0] }), io)).resolves.toBe(EXIT_INVALID);
    expect(err).toEqual(["[can-timing] error: baudRate must be a positive integer, got 0."]);
  });

  it("stops on an invalid CPU frequency", async () => {
    const { io, out, err } = createIo();
    await expect(runCli(options({ cpuFrequency: 0 }), io)).resolves.toBe(EXIT_INVALID);
    expect(out).toEqual([]);
    expect(err).toEqual(["[can-timing] error: cpuFrequency must be a positive integer, got 0."]);
  });

  it("prints the header", async () => {
    const { io, out } = createIo();
    await runCli(options({ header: true }), io);
    expect(out).toHaveLength(1);
    const lines = out[0].split("\n");
    expect(lines[1]).toBe(" * Generated 2026-01-02T03:04:05.000Z");
    expect(lines).toContain("#define CAN_BAUD_H");
    expect(lines).toContain("#define CAN_PRESCALER (16)");
  });

  it("writes the header to a file", async () => {
    const { io, out, files } = createIo();
    await runCli(options({ header: true, output: "can_baud.h" }), io);
    expect(out).toEqual(["[can-timing] wrote 1 configuration(s) to can_baud.h"]);
    expect(files.get("can_baud.h")?.split("\n")).toContain("#if F_CPU == 16000000");
  });

  it("skips the header when nothing fits", async () => {
    const { io, out, err } = createIo();
    await expect(runCli(options({ header: true, baudRates: [500000] }), io)).resolves.toBe(
      EXIT_NO_CONFIGURATION
    );
    expect(out).toEqual([]);
    expect(err).toHaveLength(1);
  });

  it("prints JSON results", async () => {
    const { io, out } = createIo();
    await runCli(options({ json: true, baudRates: [100000, 500000] }), io);
    const parsed = JSON.parse(out[0]);
    expect(parsed.cpu_frequency).toBe(16000000);
    expect(parsed.results.map((r: { status: string }) => r.status)).toEqual(["ok", "none"]);
    expect(parsed.results[0].config.time_quanta_per_bit).toBe(10);
  });

  it("explains every bit time", async () => {
    const { io, out } = createIo();
    await runCli(options({ explain: true }), io);
    expect(out[0]).toBe("Evaluation for 100000 bps at 16000000 hz:");
    expect(out[1].split("\n")).toHaveLength(18);
    expect(out[2]).toBe(SUMMARY_100K);
  });

  it("saves defaults", async () => {
    const { io, out, saveDefaults } = createIo();
    await runCli(options({ saveDefaults: true }), io);
    expect(saveDefaults).toHaveBeenCalledWith({ fCpu: 16000000, headerName: "can_baud" });
    expect(out[0]).toBe("[can-timing] saved defaults to /tmp/can-timing/config.json");
  });
});
