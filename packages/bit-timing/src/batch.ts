import { assertPositiveInteger, InvalidArgumentError } from "./errors";
import { best } from "./select";
import { search, type BitTimingConfig } from "./timing";

export type BatchEntry =
  | { baudRate: number; status: "ok"; best: BitTimingConfig; candidates: BitTimingConfig[] }
  | { baudRate: number; status: "none"; candidates: BitTimingConfig[] }
  | { baudRate: number; status: "invalid"; message: string };

const searchOne = (baudRate: number, cpuFrequency: number): BatchEntry => {
  let candidates: BitTimingConfig[];
  try {
    candidates = search(baudRate, cpuFrequency);
  } catch (error) {
    if (error instanceof InvalidArgumentError) {
      return { baudRate, status: "invalid", message: error.message };
    }
    throw error;
  }

  const selected = best(candidates);
  if (!selected) {
    return { baudRate, status: "none", candidates };
  }
  return { baudRate, status: "ok", best: selected, candidates };
};

/**
 * Runs the search once per baud rate, keeping the input order. A baud rate
 * without a configuration, or one that fails validation, only affects its own
 * entry; a bad CPU frequency throws before anything is computed.
 */
export const searchBatch = (baudRates: readonly number[], cpuFrequency: number): BatchEntry[] => {
  assertPositiveInteger(cpuFrequency, "cpuFrequency");
  return baudRates.map((baudRate) => searchOne(baudRate, cpuFrequency));
};

export const selectedConfigs = (entries: readonly BatchEntry[]) =>
  entries.flatMap((entry) => (entry.status === "ok" ? [entry.best] : []));
