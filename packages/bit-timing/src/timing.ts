import { assertPositiveInteger } from "./errors";

export const MIN_TIME_QUANTA_PER_BIT = 8;
export const MAX_TIME_QUANTA_PER_BIT = 25;

// BRP is a 6 bit field on the AVR CAN controller.
export const MAX_PRESCALER = 2 ** 6;

export const SYNC_SEGMENT = 1;
// SJW may range 1..4, the AVR application notes always use 1.
export const SYNC_JUMP_WIDTH = 1;

export const DEFAULT_MIN_ERROR_RATE = 0.5;
export const RELAXED_MIN_ERROR_RATE = 1.58;
export const RELAXED_MIN_BAUD_RATE = 125 * 1000;

export type BitSegments = {
  readonly syncSegment: number;
  readonly propSegment: number;
  readonly phaseSeg1: number;
  readonly phaseSeg2: number;
  readonly syncJumpWidth: number;
};

export type BitTimingConfig = BitSegments & {
  readonly cpuFrequency: number;
  readonly baudRate: number;
  readonly clocksPerBit: number;
  readonly timeQuantaPerBit: number;
  readonly prescaler: number;
  readonly errorRate: number;
};

export type RejectionReason =
  | "prescaler_overflow"
  | "prescaler_zero"
  | "segment_sum"
  | "prop_segment_range"
  | "phase_seg1_range"
  | "phase_seg2_range"
  | "error_rate";

export type EvaluationStatus =
  | { accepted: true; config: BitTimingConfig }
  | { accepted: false; reason: RejectionReason };

export type TimingEvaluation = {
  timeQuantaPerBit: number;
  prescaler: number;
  errorRate: number;
  minErrorRate: number;
  segments: BitSegments;
  status: EvaluationStatus;
};

const isEven = (n: number) => n % 2 === 0;

export const splitSegments = (timeQuantaPerBit: number): BitSegments => {
  const syncSegment = SYNC_SEGMENT;
  const propSegment = Math.floor(timeQuantaPerBit / 2);
  const half = Math.floor(propSegment / 2);
  const phaseSeg1 = isEven(timeQuantaPerBit - propSegment - syncSegment) ? half : half + 1;
  return {
    syncSegment,
    propSegment,
    phaseSeg1,
    phaseSeg2: half,
    syncJumpWidth: SYNC_JUMP_WIDTH,
  };
};

/**
 * Returns the first segment constraint the split violates, or null when the
 * segments form a valid bit time of `timeQuantaPerBit` quanta.
 */
export const checkSegments = (
  timeQuantaPerBit: number,
  segments: BitSegments
): RejectionReason | null => {
  const { syncSegment, propSegment, phaseSeg1, phaseSeg2 } = segments;
  if (timeQuantaPerBit !== syncSegment + propSegment + phaseSeg1 + phaseSeg2) {
    return "segment_sum";
  }
  if (propSegment < 1 || propSegment > 8) {
    return "prop_segment_range";
  }
  if (phaseSeg1 < 1 || phaseSeg1 > 8) {
    return "phase_seg1_range";
  }
  if (phaseSeg2 < 2 || phaseSeg2 > phaseSeg1) {
    return "phase_seg2_range";
  }
  return null;
};

/**
 * Error rate a candidate must stay below. The relaxed threshold needs an SJW
 * of 4, which {@link splitSegments} never produces, so search always ends up
 * with the default. Kept as is until the intended SJW policy is settled.
 */
export const minErrorRate = (segments: BitSegments, baudRate: number) => {
  if (
    segments.propSegment === 1 &&
    segments.phaseSeg1 === 4 &&
    segments.phaseSeg2 === 4 &&
    segments.syncJumpWidth === 4 &&
    baudRate > RELAXED_MIN_BAUD_RATE
  ) {
    return RELAXED_MIN_ERROR_RATE;
  }
  return DEFAULT_MIN_ERROR_RATE;
};

const evaluateTimeQuanta = (
  baudRate: number,
  cpuFrequency: number,
  clocksPerBit: number,
  timeQuantaPerBit: number
): TimingEvaluation => {
  const errorRate = clocksPerBit % timeQuantaPerBit;
  const prescaler = Math.floor(clocksPerBit / timeQuantaPerBit);
  const segments = splitSegments(timeQuantaPerBit);
  const threshold = minErrorRate(segments, baudRate);
  const base = { timeQuantaPerBit, prescaler, errorRate, minErrorRate: threshold, segments };

  const reject = (reason: RejectionReason): TimingEvaluation => ({
    ...base,
    status: { accepted: false, reason },
  });

  if (prescaler > MAX_PRESCALER) {
    return reject("prescaler_overflow");
  }
  if (prescaler < 1) {
    return reject("prescaler_zero");
  }
  const segmentError = checkSegments(timeQuantaPerBit, segments);
  if (segmentError) {
    return reject(segmentError);
  }
  if (!(errorRate < threshold)) {
    return reject("error_rate");
  }

  const config: BitTimingConfig = Object.freeze({
    cpuFrequency,
    baudRate,
    clocksPerBit,
    timeQuantaPerBit,
    prescaler,
    ...segments,
    errorRate,
  });
  return { ...base, status: { accepted: true, config } };
};

/**
 * Evaluates every bit time from 8 to 25 quanta for the given rates, accepted
 * or not, in ascending order.
 */
export const evaluate = (baudRate: number, cpuFrequency: number): TimingEvaluation[] => {
  assertPositiveInteger(baudRate, "baudRate");
  assertPositiveInteger(cpuFrequency, "cpuFrequency");

  const clocksPerBit = cpuFrequency / baudRate;
  const evaluations: TimingEvaluation[] = [];
  for (let tq = MIN_TIME_QUANTA_PER_BIT; tq <= MAX_TIME_QUANTA_PER_BIT; tq += 1) {
    evaluations.push(evaluateTimeQuanta(baudRate, cpuFrequency, clocksPerBit, tq));
  }
  return evaluations;
};

export const search = (baudRate: number, cpuFrequency: number): BitTimingConfig[] => {
  const candidates: BitTimingConfig[] = [];
  for (const evaluation of evaluate(baudRate, cpuFrequency)) {
    if (evaluation.status.accepted) {
      candidates.push(evaluation.status.config);
    }
  }
  return candidates;
};
