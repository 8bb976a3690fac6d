import {
  evaluate,
  InvalidArgumentError,
  renderDetails,
  renderEvaluation,
  renderRegisters,
  renderHeader,
  renderSummary,
  searchBatch,
  selectedConfigs,
  toBatchEntryPayload,
  type BatchEntry,
} from "@can-timing/bit-timing";
import type { TimingBatchResponse } from "@can-timing/shared";
import type { CliOptions } from "./args";

export type CliIo = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  writeFile: (filePath: string, content: string) => Promise<void>;
  saveDefaults: (defaults: { fCpu: number; headerName: string }) => Promise<string>;
  now: () => Date;
};

export const EXIT_OK = 0;
export const EXIT_INVALID = 1;
export const EXIT_NO_CONFIGURATION = 2;

const TAG = "[can-timing]";

const exitCodeFor = (entries: readonly BatchEntry[]) => {
  if (entries.some((entry) => entry.status === "invalid")) {
    return EXIT_INVALID;
  }
  if (entries.some((entry) => entry.status === "none")) {
    return EXIT_NO_CONFIGURATION;
  }
  return EXIT_OK;
};

const reportProblems = (entries: readonly BatchEntry[], cpuFrequency: number, io: CliIo) => {
  for (const entry of entries) {
    if (entry.status === "invalid") {
      io.stderr(`${TAG} error: ${entry.message}`);
    } else if (entry.status === "none") {
      io.stderr(
        `${TAG} no valid configuration for ${entry.baudRate} bps at ${cpuFrequency} hz`
      );
    }
  }
};

const printReport = (entries: readonly BatchEntry[], options: CliOptions, io: CliIo) => {
  for (const entry of entries) {
    if (entry.status !== "ok") {
      continue;
    }
    io.stdout(renderSummary(entry.best));
    if (options.showConfig) {
      io.stdout(renderDetails(entry.best));
      io.stdout(renderRegisters(entry.best));
    }
  }
};

const printExplain = (entries: readonly BatchEntry[], cpuFrequency: number, io: CliIo) => {
  for (const entry of entries) {
    if (entry.status === "invalid") {
      continue;
    }
    io.stdout(`Evaluation for ${entry.baudRate} bps at ${cpuFrequency} hz:`);
    io.stdout(renderEvaluation(evaluate(entry.baudRate, cpuFrequency)));
  }
};

const emitHeader = async (entries: readonly BatchEntry[], options: CliOptions, io: CliIo) => {
  const configs = selectedConfigs(entries);
  if (configs.length === 0) {
    return;
  }
  const header = renderHeader(configs, { name: options.headerName, generatedAt: io.now() });
  if (options.output) {
    await io.writeFile(options.output, header);
    io.stdout(`${TAG} wrote ${configs.length} configuration(s) to ${options.output}`);
    return;
  }
  io.stdout(header);
};

/**
 * Runs one invocation and returns the process exit code. Invalid arguments
 * give 1, a baud rate without a configuration gives 2; the remaining baud
 * rates are still reported.
 */
export const runCli = async (options: CliOptions, io: CliIo): Promise<number> => {
  let entries: BatchEntry[];
  try {
    entries = searchBatch(options.baudRates, options.cpuFrequency);
  } catch (error) {
    if (error instanceof InvalidArgumentError) {
      io.stderr(`${TAG} error: ${error.message}`);
      return EXIT_INVALID;
    }
    throw error;
  }

  if (options.saveDefaults) {
    const filePath = await io.saveDefaults({
      fCpu: options.cpuFrequency,
      headerName: options.headerName,
    });
    io.stdout(`${TAG} saved defaults to ${filePath}`);
  }

  if (options.json) {
    const response: TimingBatchResponse = {
      cpu_frequency: options.cpuFrequency,
      results: entries.map(toBatchEntryPayload),
    };
    io.stdout(JSON.stringify(response, null, 2));
    return exitCodeFor(entries);
  }

  if (options.explain) {
    printExplain(entries, options.cpuFrequency, io);
  }

  if (options.header) {
    await emitHeader(entries, options, io);
  } else {
    printReport(entries, options, io);
  }

  reportProblems(entries, options.cpuFrequency, io);
  return exitCodeFor(entries);
};
