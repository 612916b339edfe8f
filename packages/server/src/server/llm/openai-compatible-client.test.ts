import OpenAI from "openai";
import { describe, expect, test } from "vitest";
import { NetworkTimeoutError, UpstreamApiError, isTemporaryError } from "../../shared/errors.js";
import { toProviderError } from "./openai-compatible-client.js";

describe("toProviderError", () => {
  test("returns the abort reason once the request signal fired", () => {
    const controller = new AbortController();
    const reason = new NetworkTimeoutError("LLM request timed out after 1000ms");
    controller.abort(reason);

    expect(toProviderError(new Error("Request was aborted."), controller.signal)).toBe(reason);
  });

  test("maps SDK timeouts to network timeouts", () => {
    const mapped = toProviderError(new OpenAI.APIConnectionTimeoutError());

    expect(mapped).toBeInstanceOf(NetworkTimeoutError);
    expect(isTemporaryError(mapped)).toBe(true);
  });

  test("keeps the HTTP status of API errors", () => {
    const overloaded = toProviderError(
      new OpenAI.APIError(503, { message: "overloaded" }, undefined, undefined)
    );
    const unauthorized = toProviderError(
      new OpenAI.APIError(401, { message: "invalid key" }, undefined, undefined)
    );

    expect(overloaded).toBeInstanceOf(UpstreamApiError);
    expect(overloaded instanceof UpstreamApiError && overloaded.statusCode).toBe(503);
    expect(isTemporaryError(overloaded)).toBe(true);
    expect(isTemporaryError(unauthorized)).toBe(false);
  });

  test("passes other errors through", () => {
    const error = new Error("socket hang up");

    expect(toProviderError(error)).toBe(error);
    expect(toProviderError("boom")).toEqual(new Error("boom"));
  });
});
