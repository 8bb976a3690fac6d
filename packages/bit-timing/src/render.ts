import { registerValues, toHexByte } from "./registers";
import type { BitTimingConfig, TimingEvaluation } from "./timing";

export const renderSummary = (config: BitTimingConfig) =>
  `CPU frequency ${config.cpuFrequency} hz, CAN baudrate ${config.baudRate} bps, error rate: ${config.errorRate}%`;

export const renderDetails = (config: BitTimingConfig) =>
  [
    "Config at Time Quantum = 1",
    `Prescaler: ${config.prescaler}`,
    `Tbit: ${config.timeQuantaPerBit}`,
    `Sync: ${config.syncSegment}`,
    `Propagation segment: ${config.propSegment}`,
    `Phase Segment 1: ${config.phaseSeg1}`,
    `Phase Segment 2: ${config.phaseSeg2}`,
    `SJW: ${config.syncJumpWidth}`,
  ].join("\n\t");

export const renderRegisters = (config: BitTimingConfig) => {
  const { canbt1, canbt2, canbt3 } = registerValues(config);
  return `Registers: CANBT1=${toHexByte(canbt1)} CANBT2=${toHexByte(canbt2)} CANBT3=${toHexByte(canbt3)}`;
};

const formatRate = (value: number) => Number(value.toFixed(6)).toString();

export const renderEvaluation = (evaluations: readonly TimingEvaluation[]) =>
  evaluations
    .map((evaluation) => {
      const { syncSegment, propSegment, phaseSeg1, phaseSeg2 } = evaluation.segments;
      const outcome = evaluation.status.accepted ? "ok" : `rejected (${evaluation.status.reason})`;
      return (
        `Tbit ${String(evaluation.timeQuantaPerBit).padStart(2)}: ` +
        `prescaler=${evaluation.prescaler} ` +
        `segments=${syncSegment}+${propSegment}+${phaseSeg1}+${phaseSeg2} ` +
        `error=${formatRate(evaluation.errorRate)} ${outcome}`
      );
    })
    .join("\n");
