export type TimingRequest = {
  baud_rate: number;
  cpu_frequency: number;
};

export type TimingBatchRequest = {
  baud_rates: number[];
  cpu_frequency: number;
};

export type TimingHeaderRequest = TimingBatchRequest & {
  name?: string;
};

export type RegisterPayload = {
  canbt1: number;
  canbt2: number;
  canbt3: number;
};

export type BitTimingPayload = {
  cpu_frequency: number;
  baud_rate: number;
  clocks_per_bit: number;
  time_quanta_per_bit: number;
  prescaler: number;
  sync_segment: number;
  prop_segment: number;
  phase_seg1: number;
  phase_seg2: number;
  sync_jump_width: number;
  error_rate: number;
  registers: RegisterPayload;
};

export type TimingSearchResponse = TimingRequest & {
  candidates: BitTimingPayload[];
};

export type TimingBestResponse = TimingRequest & {
  config: BitTimingPayload | null;
};

export type TimingEvaluationPayload = {
  time_quanta_per_bit: number;
  prescaler: number;
  error_rate: number;
  min_error_rate: number;
  prop_segment: number;
  phase_seg1: number;
  phase_seg2: number;
  accepted: boolean;
  reason: string | null;
};

export type TimingExplainResponse = TimingRequest & {
  evaluations: TimingEvaluationPayload[];
};

export type TimingBatchEntryPayload =
  | { baud_rate: number; status: "ok"; config: BitTimingPayload; candidate_count: number }
  | { baud_rate: number; status: "none"; config: null; candidate_count: 0 }
  // baud_rate echoes the request entry, which may not be a number
  | { baud_rate: unknown; status: "invalid"; config: null; message: string };

export type TimingBatchResponse = {
  cpu_frequency: number;
  results: TimingBatchEntryPayload[];
};
