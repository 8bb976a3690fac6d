import { parseArgs } from "util";
import { DEFAULT_HEADER_NAME } from "@can-timing/bit-timing";
import type { CliDefaults } from "./config/store";

export type CliOptions = {
  cpuFrequency: number;
  baudRates: number[];
  showConfig: boolean;
  header: boolean;
  headerName: string;
  output?: string;
  explain: boolean;
  json: boolean;
  saveDefaults: boolean;
};

export type ParsedArgs = { help: true } | { help: false; options: CliOptions };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export const USAGE = [
  "Usage: can-timing --f-cpu <hz> --baudrate <bps>[,<bps>...] [options]",
  "",
  "Options:",
  "  --f-cpu <hz>        CPU clock frequency (default: CAN_TIMING_F_CPU or saved default)",
  "  --baudrate <bps>    CAN baud rate; repeat or separate with commas",
  "  --config            print the segmentation of the selected configuration",
  "  --explain           print the evaluation of every bit time",
  "  --header            generate a C header instead of the summary",
  "  --name <name>       header name (default: can_baud)",
  "  --output <file>     write the header to a file",
  "  --json              print the results as JSON (not with --header, --explain or --config)",
  "  --save-defaults     remember --f-cpu and --name for later runs",
  "  -h, --help          show this help",
].join("\n");

type Env = Record<string, string | undefined>;

const parseNumber = (raw: string, flag: string) => {
  const trimmed = raw.trim();
  // Number("") is 0, which would read as a valid-looking rate
  const value = trimmed === "" ? Number.NaN : Number(trimmed);
  if (Number.isNaN(value)) {
    throw new UsageError(`${flag} expects a number, got "${raw}".`);
  }
  return value;
};

export const parseBaudRates = (values: readonly string[]) =>
  values.flatMap((value) => value.split(",")).map((raw) => parseNumber(raw, "--baudrate"));

const resolveCpuFrequency = (flag: string | undefined, env: Env, defaults: CliDefaults) => {
  if (flag !== undefined) {
    return parseNumber(flag, "--f-cpu");
  }
  if (env.CAN_TIMING_F_CPU) {
    return parseNumber(env.CAN_TIMING_F_CPU, "CAN_TIMING_F_CPU");
  }
  if (defaults.fCpu !== undefined) {
    return defaults.fCpu;
  }
  throw new UsageError("--f-cpu is required.");
};

const readFlags = (argv: string[]) =>
  parseArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      "f-cpu": { type: "string" },
      f_cpu: { type: "string" },
      baudrate: { type: "string", multiple: true },
      config: { type: "boolean" },
      explain: { type: "boolean" },
      header: { type: "boolean" },
      name: { type: "string" },
      output: { type: "string" },
      json: { type: "boolean" },
      "save-defaults": { type: "boolean" },
      help: { type: "boolean", short: "h" },
    },
  }).values;

export const parseCliArgs = (
  argv: string[],
  env: Env = process.env,
  defaults: CliDefaults = {}
): ParsedArgs => {
  let values: ReturnType<typeof readFlags>;
  try {
    values = readFlags(argv);
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }

  if (values.help === true) {
    return { help: true };
  }

  const baudRates = parseBaudRates(values.baudrate ?? []);
  if (baudRates.length === 0) {
    throw new UsageError("--baudrate is required.");
  }
  if (values.output !== undefined && values.header !== true) {
    throw new UsageError("--output requires --header.");
  }
  if (values.json === true) {
    const conflicting = (["header", "explain", "config"] as const).filter(
      (flag) => values[flag] === true
    );
    if (conflicting.length > 0) {
      throw new UsageError(`--json cannot be combined with --${conflicting.join(", --")}.`);
    }
  }

  return {
    help: false,
    options: {
      cpuFrequency: resolveCpuFrequency(values["f-cpu"] ?? values.f_cpu, env, defaults),
      baudRates,
      showConfig: values.config === true,
      header: values.header === true,
      headerName: values.name ?? defaults.headerName ?? DEFAULT_HEADER_NAME,
      output: values.output,
      explain: values.explain === true,
      json: values.json === true,
      saveDefaults: values["save-defaults"] === true,
    },
  };
};
