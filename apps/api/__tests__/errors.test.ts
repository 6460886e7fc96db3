/**
 * Error Response Mapping Tests
 */

import { describe, it, expect } from "@jest/globals";
import { ErrorCode } from "@urlkit/shared";
import { errorResponse, messageForCode, statusForCode } from "../src/errors.js";

describe("error mapping", () => {
  it.each([
    [ErrorCode.VALIDATION, 400, "Validation failed"],
    [ErrorCode.INVALID_URL, 400, "Invalid URL provided"],
    [ErrorCode.NOT_FOUND, 404, "Resource not found"],
    [ErrorCode.ALREADY_EXISTS, 409, "Resource already exists"],
    [ErrorCode.INTERNAL, 500, "Internal server error"],
  ])("should map %s to %i with its phrase", (code, status, message) => {
    expect(statusForCode(code)).toBe(status);
    expect(messageForCode(code)).toBe(message);
  });

  it("should default the phrase from the status", () => {
    expect(errorResponse(404, "Short code not found")).toEqual({
      error: "Short code not found",
      message: "Resource not found",
      code: 404,
    });
  });
});
