import { search, type BitTimingConfig } from "./timing";

export const best = (candidates: readonly BitTimingConfig[]): BitTimingConfig | null => {
  let selected: BitTimingConfig | null = null;
  for (const candidate of candidates) {
    // strict comparison keeps the lowest Tbit on ties
    if (!selected || candidate.errorRate < selected.errorRate) {
      selected = candidate;
    }
  }
  return selected;
};

export const findBest = (baudRate: number, cpuFrequency: number) =>
  best(search(baudRate, cpuFrequency));
