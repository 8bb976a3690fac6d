import type {
  BitTimingPayload,
  TimingBatchEntryPayload,
  TimingEvaluationPayload,
} from "@can-timing/shared";
import type { BatchEntry } from "./batch";
import { registerValues } from "./registers";
import type { BitTimingConfig, TimingEvaluation } from "./timing";

export const toTimingPayload = (config: BitTimingConfig): BitTimingPayload => ({
  cpu_frequency: config.cpuFrequency,
  baud_rate: config.baudRate,
  clocks_per_bit: config.clocksPerBit,
  time_quanta_per_bit: config.timeQuantaPerBit,
  prescaler: config.prescaler,
  sync_segment: config.syncSegment,
  prop_segment: config.propSegment,
  phase_seg1: config.phaseSeg1,
  phase_seg2: config.phaseSeg2,
  sync_jump_width: config.syncJumpWidth,
  error_rate: config.errorRate,
  registers: registerValues(config),
});

export const toEvaluationPayload = (evaluation: TimingEvaluation): TimingEvaluationPayload => ({
  time_quanta_per_bit: evaluation.timeQuantaPerBit,
  prescaler: evaluation.prescaler,
  error_rate: evaluation.errorRate,
  min_error_rate: evaluation.minErrorRate,
  prop_segment: evaluation.segments.propSegment,
  phase_seg1: evaluation.segments.phaseSeg1,
  phase_seg2: evaluation.segments.phaseSeg2,
  accepted: evaluation.status.accepted,
  reason: evaluation.status.accepted ? null : evaluation.status.reason,
});

export const toBatchEntryPayload = (entry: BatchEntry): TimingBatchEntryPayload => {
  switch (entry.status) {
    case "ok":
      return {
        baud_rate: entry.baudRate,
        status: "ok",
        config: toTimingPayload(entry.best),
        candidate_count: entry.candidates.length,
      };
    case "none":
      return { baud_rate: entry.baudRate, status: "none", config: null, candidate_count: 0 };
    case "invalid":
      return { baud_rate: entry.baudRate, status: "invalid", config: null, message: entry.message };
  }
};
