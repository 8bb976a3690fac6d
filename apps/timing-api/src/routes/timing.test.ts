import type { NextFunction, Request, Response } from "express";
import { describe, expect, it, vi } from "vitest";
import { ErrorCodes } from "@can-timing/shared";
import { AppError } from "../errors/app-error";
import { createTimingRouter } from "./timing";

type Outcome =
  | { kind: "json"; body: unknown }
  | { kind: "send"; body: unknown }
  | { kind: "next"; error: unknown; body?: undefined };

const dispatch = (url: string, body: unknown) => {
  const router = createTimingRouter({ maxBatchSize: 8 });
  const req = { method: "POST", url, body, headers: {} };
  const res = {
    setHeader: vi.fn(),
    type: vi.fn(),
    status: vi.fn(),
    json: vi.fn(),
    send: vi.fn(),
  };
  res.type.mockReturnValue(res);
  res.status.mockReturnValue(res);

  const outcome = new Promise<Outcome>((resolve) => {
    res.json.mockImplementation((payload: unknown) => resolve({ kind: "json", body: payload }));
    res.send.mockImplementation((payload: unknown) => resolve({ kind: "send", body: payload }));
    const next: NextFunction = (error?: unknown) => resolve({ kind: "next", error });
    router(req as unknown as Request, res as unknown as Response, next);
  });
  return { res, outcome };
};

describe("timing router", () => {
  it("sends the header as text and lists missing baud rates", async () => {
    const { res, outcome } = dispatch("/header", {
      cpu_frequency: 16000000,
      baud_rates: [100000, 500000],
    });
    const result = await outcome;

    expect(result.kind).toBe("send");
    expect(res.setHeader).toHaveBeenCalledWith("x-missing-baud-rates", "500000");
    expect(res.type).toHaveBeenCalledWith("text/plain");
    expect(typeof result.body === "string" && result.body.split("\n")[0]).toBe("/**");
  });

  it("omits the missing header when every baud rate fits", async () => {
    const { res, outcome } = dispatch("/header", {
      cpu_frequency: 16000000,
      baud_rate: 100000,
    });
    expect((await outcome).kind).toBe("send");
    expect(res.setHeader).not.toHaveBeenCalled();
  });

  it("replies to search with JSON", async () => {
    const { outcome } = dispatch("/search", { baud_rate: 100000, cpu_frequency: 16000000 });
    const result = await outcome;

    expect(result.kind).toBe("json");
    expect(result.body).toMatchObject({ baud_rate: 100000, cpu_frequency: 16000000 });
  });

  it("passes validation failures to the error handler", async () => {
    const { res, outcome } = dispatch("/best", { baud_rate: "fast", cpu_frequency: 16000000 });
    const result = await outcome;

    expect(result.kind).toBe("next");
    expect(result.kind === "next" && result.error).toBeInstanceOf(AppError);
    expect(result.kind === "next" && result.error).toMatchObject({
      code: ErrorCodes.VALIDATION_ERROR,
      status: 400,
    });
    expect(res.json).not.toHaveBeenCalled();
  });

  it("falls through for unknown paths", async () => {
    const { outcome } = dispatch("/unknown", {});
    expect(await outcome).toEqual({ kind: "next", error: undefined });
  });
});
