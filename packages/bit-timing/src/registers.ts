import type { BitTimingConfig } from "./timing";

// Bit offsets in the AT90CAN CANBT1..3 registers.
export const BRP0 = 1;
export const PRS0 = 1;
export const SJW0 = 5;
export const PHS10 = 1;
export const PHS20 = 4;

export type RegisterValues = {
  canbt1: number;
  canbt2: number;
  canbt3: number;
};

export const registerValues = (config: BitTimingConfig): RegisterValues => ({
  canbt1: ((config.prescaler - 1) << BRP0) & 0xff,
  canbt2: (((config.propSegment - 1) << PRS0) | ((config.syncJumpWidth - 1) << SJW0)) & 0xff,
  canbt3: (((config.phaseSeg1 - 1) << PHS10) | ((config.phaseSeg2 - 1) << PHS20)) & 0xff,
});

export const toHexByte = (value: number) => `0x${value.toString(16).padStart(2, "0")}`;
