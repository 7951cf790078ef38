/**
 * Response Decoder
 *
 * Raw body -> envelope -> payload of the tag the issuing command declared.
 *
 *   not JSON                 -> DecodeError("$"), or TransportError when the
 *                               HTTP status already says the request failed
 *   status FAILED            -> ApiError(comment), whatever `result` holds
 *   payload of wrong shape   -> DecodeError(path of the first bad field)
 */

import type { ZodIssue } from "zod";
import { ApiError, DecodeError, TransportError } from "../errors/ApiClientError.js";
import { envelopeSchema } from "./result_schemas.js";
import {
    RESULT_SCHEMAS,
    type ApiResult,
    type Envelope,
    type ResultShapes,
    type ResultTag,
    type TaggedResult
} from "./result_types.js";

export interface DecodeOptions {
    readonly methodName?: string;
    /** HTTP status of the response, when the transport reports one */
    readonly httpStatus?: number;
}

// ============================================================================
// Field Paths
// ============================================================================

export function formatFieldPath(root: string, path: ReadonlyArray<string | number>): string {
    let out = root;
    for (const segment of path) {
        out += typeof segment === "number" ? `[${segment}]` : out ? `.${segment}` : segment;
    }
    return out || "$";
}

function describeIssue(issue: ZodIssue): string {
    if (issue.code === "invalid_type" && issue.received === "undefined") {
        return "missing required field";
    }
    return issue.message;
}

function toDecodeError(root: string, issues: readonly ZodIssue[], methodName?: string): DecodeError {
    const first = issues[0];
    if (!first) {
        return new DecodeError(root || "$", "invalid value", methodName);
    }
    return new DecodeError(formatFieldPath(root, first.path), describeIssue(first), methodName);
}

// ============================================================================
// Decoding
// ============================================================================

export function decodeEnvelope(body: Uint8Array | string, options: DecodeOptions = {}): Envelope {
    const text = typeof body === "string" ? body : Buffer.from(body).toString("utf8");

    let json: unknown;
    try {
        json = JSON.parse(text);
    } catch (error) {
        if (options.httpStatus !== undefined && options.httpStatus >= 400) {
            throw new TransportError("HTTP_STATUS", `HTTP ${options.httpStatus}`, {
                methodName: options.methodName,
                httpStatus: options.httpStatus,
                cause: error
            });
        }
        throw new DecodeError("$", "response body is not valid JSON", options.methodName);
    }

    const parsed = envelopeSchema.safeParse(json);
    if (!parsed.success) {
        throw toDecodeError("", parsed.error.issues, options.methodName);
    }
    return parsed.data;
}

export function decodeResult<T extends ResultTag>(
    tag: T,
    payload: unknown,
    methodName?: string
): TaggedResult<T> {
    const parsed = RESULT_SCHEMAS[tag].safeParse(payload);
    if (!parsed.success) {
        throw toDecodeError("result", parsed.error.issues, methodName);
    }
    return { tag, value: parsed.data };
}

export function decodeResponse<T extends ResultTag>(
    body: Uint8Array | string,
    tag: T,
    options: DecodeOptions = {}
): TaggedResult<T> {
    const envelope = decodeEnvelope(body, options);

    if (envelope.status === "FAILED") {
        throw new ApiError(envelope.comment ?? "", options.methodName);
    }

    if (envelope.result === undefined) {
        throw new DecodeError("result", "missing required field", options.methodName);
    }

    return decodeResult(tag, envelope.result, options.methodName);
}

// ============================================================================
// Narrowing
// ============================================================================

/**
 * A result carried a tag other than the one its command declared. Only a
 * disagreement between the command model and the decoder can cause this.
 */
export class ResultTagMismatchError extends Error {
    readonly expected: ResultTag;
    readonly actual: ResultTag;

    constructor(expected: ResultTag, actual: ResultTag) {
        super(`Expected a "${expected}" result, got "${actual}"`);
        this.name = "ResultTagMismatchError";
        this.expected = expected;
        this.actual = actual;
    }
}

export function expectResult<T extends ResultTag>(result: ApiResult, tag: T): ResultShapes[T] {
    if (result.tag !== tag) {
        throw new ResultTagMismatchError(tag, result.tag);
    }
    return decodeResult(tag, result.value).value;
}
