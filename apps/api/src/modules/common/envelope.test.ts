import { HttpStatus, UnauthorizedException } from "@nestjs/common";
import { describe, expect, it } from "vitest";
import { z } from "zod";

import { describeError } from "./envelope";
import { InsufficientFundsError, NotFoundError, PriceUnavailableError } from "./errors";
import { withTimeout } from "./with-timeout";

describe("describeError", () => {
  it("maps domain errors to HTTP statuses", () => {
    expect(describeError(new NotFoundError("AAPL is not being monitored"))).toEqual({
      status: HttpStatus.NOT_FOUND,
      message: "AAPL is not being monitored"
    });
    expect(describeError(new InsufficientFundsError("short")).status).toBe(HttpStatus.CONFLICT);
    expect(describeError(new PriceUnavailableError("AAPL", "no quote")).status).toBe(HttpStatus.SERVICE_UNAVAILABLE);
  });

  it("lists validation issues with their paths", () => {
    const result = z.object({ quantity: z.number().positive() }).safeParse({ quantity: -1 });
    if (result.success) throw new Error("expected a validation failure");

    expect(describeError(result.error)).toEqual({
      status: HttpStatus.BAD_REQUEST,
      message: "Invalid request: quantity: Number must be greater than 0"
    });
  });

  it("keeps the status of Nest HTTP exceptions", () => {
    expect(describeError(new UnauthorizedException("Invalid API key"))).toEqual({
      status: HttpStatus.UNAUTHORIZED,
      message: "Invalid API key"
    });
  });

  it("treats anything else as an internal error", () => {
    expect(describeError("boom")).toEqual({ status: HttpStatus.INTERNAL_SERVER_ERROR, message: "boom" });
  });
});

describe("withTimeout", () => {
  it("resolves when the operation settles first", async () => {
    await expect(withTimeout(Promise.resolve(7), 50, "fast")).resolves.toBe(7);
  });

  it("rejects with the label once the deadline passes", async () => {
    await expect(withTimeout(new Promise<number>(() => undefined), 20, "quote AAPL")).rejects.toThrow(
      "quote AAPL exceeded 20ms"
    );
  });
});
