import { HttpException, HttpStatus } from "@nestjs/common";
import { ZodError } from "zod";

import { AutopilotError, type AutopilotErrorCode, errorMessage } from "./errors";

const STATUS_BY_CODE: Record<AutopilotErrorCode, HttpStatus> = {
  CONFIG: HttpStatus.BAD_REQUEST,
  NOT_FOUND: HttpStatus.NOT_FOUND,
  INSUFFICIENT_FUNDS: HttpStatus.CONFLICT,
  INSUFFICIENT_SHARES: HttpStatus.CONFLICT,
  ORDER_REJECTED: HttpStatus.BAD_GATEWAY,
  PRICE_UNAVAILABLE: HttpStatus.SERVICE_UNAVAILABLE
};

export type DescribedError = {
  status: HttpStatus;
  message: string;
};

export function formatZodError(err: ZodError): string {
  const issues = err.issues.map((issue) => {
    const where = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    return `${where}${issue.message}`;
  });
  return `Invalid request: ${issues.join("; ")}`;
}

export function describeError(err: unknown): DescribedError {
  if (err instanceof AutopilotError) {
    return { status: STATUS_BY_CODE[err.code], message: err.message };
  }
  if (err instanceof ZodError) {
    return { status: HttpStatus.BAD_REQUEST, message: formatZodError(err) };
  }
  if (err instanceof HttpException) {
    return { status: err.getStatus(), message: err.message };
  }
  return { status: HttpStatus.INTERNAL_SERVER_ERROR, message: errorMessage(err) };
}
