import {
  evaluate,
  findBest,
  InvalidArgumentError,
  renderHeader,
  search,
  searchBatch,
  selectedConfigs,
  toBatchEntryPayload,
  toEvaluationPayload,
  toTimingPayload,
  DEFAULT_HEADER_NAME,
} from "@can-timing/bit-timing";
import {
  ErrorCodes,
  type TimingBatchEntryPayload,
  type TimingBatchResponse,
  type TimingBestResponse,
  type TimingExplainResponse,
  type TimingHeaderRequest,
  type TimingRequest,
  type TimingSearchResponse,
} from "@can-timing/shared";
import { AppError } from "../errors/app-error";

// request fields before validation
type TimingBody = { [K in keyof (TimingRequest & TimingHeaderRequest)]?: unknown };

const asBody = (body: unknown): TimingBody => {
  if (typeof body !== "object" || body === null) {
    return {};
  }
  const record: Record<string, unknown> = { ...body };
  return record;
};

const normalizeRate = (value: unknown, name: string) => {
  if (typeof value !== "number" || !Number.isSafeInteger(value) || value <= 0) {
    throw new AppError(ErrorCodes.VALIDATION_ERROR, `${name} must be a positive integer.`, 400, {
      field: name,
    });
  }
  return value;
};

const normalizeBaudRates = (value: unknown, maxBatchSize: number) => {
  if (!Array.isArray(value) || value.length === 0) {
    throw new AppError(ErrorCodes.VALIDATION_ERROR, "baud_rates must be a non-empty array.", 400, {
      field: "baud_rates",
    });
  }
  if (value.length > maxBatchSize) {
    throw new AppError(
      ErrorCodes.VALIDATION_ERROR,
      `baud_rates accepts at most ${maxBatchSize} entries.`,
      400,
      { field: "baud_rates" }
    );
  }
  const entries: unknown[] = value;
  return entries;
};

const isNumber = (value: unknown): value is number => typeof value === "number";

const NOT_A_NUMBER_MESSAGE = "baud_rates entries must be numbers.";

const normalizeName = (value: unknown) => {
  if (value === undefined || value === null) {
    return DEFAULT_HEADER_NAME;
  }
  if (typeof value !== "string" || !value.trim()) {
    throw new AppError(ErrorCodes.VALIDATION_ERROR, "name must be a non-empty string.", 400, {
      field: "name",
    });
  }
  return value;
};

const withValidation = <T>(fn: () => T): T => {
  try {
    return fn();
  } catch (error) {
    if (error instanceof InvalidArgumentError) {
      throw new AppError(ErrorCodes.VALIDATION_ERROR, error.message, 400, {
        field: error.argument,
      });
    }
    throw error;
  }
};

export const parseTimingRequest = (body: unknown): TimingRequest => {
  const payload = asBody(body);
  return {
    baud_rate: normalizeRate(payload.baud_rate, "baud_rate"),
    cpu_frequency: normalizeRate(payload.cpu_frequency, "cpu_frequency"),
  };
};

export const searchTimings = (body: unknown): TimingSearchResponse => {
  const request = parseTimingRequest(body);
  const candidates = withValidation(() => search(request.baud_rate, request.cpu_frequency));
  return { ...request, candidates: candidates.map(toTimingPayload) };
};

export const bestTiming = (body: unknown): TimingBestResponse => {
  const request = parseTimingRequest(body);
  const config = withValidation(() => findBest(request.baud_rate, request.cpu_frequency));
  return { ...request, config: config ? toTimingPayload(config) : null };
};

export const explainTimings = (body: unknown): TimingExplainResponse => {
  const request = parseTimingRequest(body);
  const evaluations = withValidation(() => evaluate(request.baud_rate, request.cpu_frequency));
  return { ...request, evaluations: evaluations.map(toEvaluationPayload) };
};

export const batchTimings = (body: unknown, maxBatchSize: number): TimingBatchResponse => {
  const payload = asBody(body);
  const cpuFrequency = normalizeRate(payload.cpu_frequency, "cpu_frequency");
  const requested = normalizeBaudRates(payload.baud_rates, maxBatchSize);
  const computed = withValidation(() =>
    searchBatch(requested.filter(isNumber), cpuFrequency)
  ).map(toBatchEntryPayload);

  // merge back in request order; non-numbers are reported without a search
  let next = 0;
  const results = requested.map((entry): TimingBatchEntryPayload => {
    if (!isNumber(entry)) {
      return { baud_rate: entry, status: "invalid", config: null, message: NOT_A_NUMBER_MESSAGE };
    }
    const result = computed[next];
    next += 1;
    return result;
  });
  return { cpu_frequency: cpuFrequency, results };
};

export const timingHeader = (body: unknown, maxBatchSize: number, generatedAt = new Date()) => {
  const payload = asBody(body);
  const cpuFrequency = normalizeRate(payload.cpu_frequency, "cpu_frequency");
  const requested: unknown[] =
    payload.baud_rates === undefined && payload.baud_rate !== undefined
      ? [normalizeRate(payload.baud_rate, "baud_rate")]
      : normalizeBaudRates(payload.baud_rates, maxBatchSize);
  if (!requested.every(isNumber)) {
    throw new AppError(ErrorCodes.VALIDATION_ERROR, NOT_A_NUMBER_MESSAGE, 400, {
      field: "baud_rates",
    });
  }
  const baudRates: number[] = requested;
  const name = normalizeName(payload.name);

  const entries = withValidation(() => searchBatch(baudRates, cpuFrequency));
  const invalid = entries.find((entry) => entry.status === "invalid");
  if (invalid) {
    throw new AppError(
      ErrorCodes.VALIDATION_ERROR,
      `Invalid baud rate ${String(invalid.baudRate)}.`,
      400,
      { field: "baud_rates" }
    );
  }
  const configs = selectedConfigs(entries);
  if (configs.length === 0) {
    throw new AppError(
      ErrorCodes.NO_VALID_CONFIGURATION,
      "No valid bit timing for the requested baud rates.",
      422,
      { baud_rates: baudRates, cpu_frequency: cpuFrequency }
    );
  }

  const missing = entries.filter((entry) => entry.status === "none").map((e) => e.baudRate);
  return {
    header: withValidation(() => renderHeader(configs, { name, generatedAt })),
    missing,
  };
};
