import assert from "node:assert/strict";
import test from "node:test";
import {
    ApiClientError,
    ApiError,
    ApiErrorCode,
    DecodeError,
    InvalidParameterError,
    TransportError,
    createTransportError,
    isRetryableStatusCode
} from "../core/errors/ApiClientError.js";

function named(name: string, message: string): Error {
    const error = new Error(message);
    error.name = name;
    return error;
}

test("every error kind is an ApiClientError with its own code", () => {
    const cases: Array<[ApiClientError, ApiErrorCode]> = [
        [new InvalidParameterError("count", "expected an integer, got 1.5"), ApiErrorCode.INVALID_PARAMETER],
        [new TransportError("TIMEOUT", "Request timeout"), ApiErrorCode.TRANSPORT_ERROR],
        [new ApiError("handle: Field should not be empty"), ApiErrorCode.API_ERROR],
        [new DecodeError("result.id", "missing required field"), ApiErrorCode.DECODE_ERROR]
    ];

    for (const [error, code] of cases) {
        assert.ok(error instanceof ApiClientError);
        assert.ok(error instanceof Error);
        assert.equal(error.code, code);
    }
});

test("toJSON carries the detail without the stack", () => {
    const error = new DecodeError("result[0].handle", "missing required field", "user.info");

    assert.deepEqual(error.toJSON(), {
        code: ApiErrorCode.DECODE_ERROR,
        message: "Cannot decode result[0].handle: missing required field",
        methodName: "user.info",
        timestamp: error.timestamp,
        retryable: false,
        metadata: { fieldPath: "result[0].handle" }
    });
});

test("only throttling and server statuses are retryable", () => {
    assert.equal(isRetryableStatusCode(429), true);
    assert.equal(isRetryableStatusCode(503), true);
    assert.equal(isRetryableStatusCode(404), false);
    assert.equal(isRetryableStatusCode(undefined), false);

    assert.equal(new TransportError("HTTP_STATUS", "HTTP 404", { httpStatus: 404 }).retryable, false);
    assert.equal(new TransportError("HTTP_STATUS", "HTTP 503", { httpStatus: 503 }).retryable, true);
    assert.equal(new TransportError("NETWORK_ERROR", "socket hang up").retryable, true);
});

test("API errors are retryable only for the call limit", () => {
    assert.equal(new ApiError("Call limit exceeded").retryable, true);
    assert.equal(new ApiError("apiKey: Incorrect API key").retryable, false);
    assert.equal(new ApiError("apiKey: Incorrect API key").message, "Codeforces API: apiKey: Incorrect API key");
});

test("transport failures are classified by what was thrown", () => {
    const refusedCause = Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:443"), { code: "ECONNREFUSED" });

    assert.equal(createTransportError(new TypeError("fetch failed", { cause: refusedCause })).kind, "CONNECTION_REFUSED");
    assert.equal(createTransportError(named("AbortError", "This operation was aborted")).kind, "TIMEOUT");
    assert.equal(createTransportError(named("TimeoutError", "The operation timed out")).kind, "TIMEOUT");
    assert.equal(createTransportError(new Error("connect ETIMEDOUT 10.0.0.1:443")).kind, "TIMEOUT");
    assert.equal(createTransportError(new Error("getaddrinfo ENOTFOUND codeforces.com")).kind, "NETWORK_ERROR");
    assert.equal(createTransportError("boom").message, "boom");
});

test("an existing TransportError passes through unchanged", () => {
    const original = new TransportError("HTTP_STATUS", "HTTP 502", { httpStatus: 502 });

    assert.equal(createTransportError(original, "contest.list"), original);
});

test("the method name is attached to wrapped failures", () => {
    const error = createTransportError(new Error("socket hang up"), "user.status");

    assert.equal(error.methodName, "user.status");
    assert.equal(error.message, "socket hang up");
});
