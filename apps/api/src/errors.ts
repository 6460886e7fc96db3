/**
 * Maps service errors to HTTP responses.
 */

import { ErrorCode } from "@urlkit/shared";

/** Response body for every failed request */
export interface ErrorResponse {
  error: string;
  message: string;
  /** HTTP status */
  code: number;
}

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  [ErrorCode.VALIDATION]: 400,
  [ErrorCode.INVALID_URL]: 400,
  [ErrorCode.NOT_FOUND]: 404,
  [ErrorCode.ALREADY_EXISTS]: 409,
  [ErrorCode.INTERNAL]: 500,
};

const MESSAGE_BY_STATUS: Record<number, string> = {
  400: "Validation failed",
  404: "Resource not found",
  409: "Resource already exists",
  500: "Internal server error",
};

/** Codes whose phrase differs from their status' default */
const MESSAGE_BY_CODE: Partial<Record<ErrorCode, string>> = {
  [ErrorCode.INVALID_URL]: "Invalid URL provided",
};

export function statusForCode(code: ErrorCode): number {
  return STATUS_BY_CODE[code];
}

export function messageForCode(code: ErrorCode): string {
  return MESSAGE_BY_CODE[code] ?? MESSAGE_BY_STATUS[statusForCode(code)] ?? "Request failed";
}

export function errorResponse(
  status: number,
  error: string,
  message: string = MESSAGE_BY_STATUS[status] ?? "Request failed"
): ErrorResponse {
  return { error, message, code: status };
}
