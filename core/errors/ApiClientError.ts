/**
 * API Client Error Taxonomy
 *
 * Every failure surfaced by the client is one of four kinds:
 * - INVALID_PARAMETER: malformed caller input, found before any crypto or network work
 * - TRANSPORT_ERROR: the injected transport failed (unreachable, timeout, refused)
 * - API_ERROR: the service answered with status FAILED and a comment
 * - DECODE_ERROR: the response did not match the shape the command expects
 */

export enum ApiErrorCode {
    INVALID_PARAMETER = "INVALID_PARAMETER",
    TRANSPORT_ERROR = "TRANSPORT_ERROR",
    API_ERROR = "API_ERROR",
    DECODE_ERROR = "DECODE_ERROR"
}

export type TransportFailureKind =
    | "NETWORK_ERROR"
    | "TIMEOUT"
    | "CONNECTION_REFUSED"
    | "HTTP_STATUS";

export interface ApiErrorDetail {
    readonly code: ApiErrorCode;
    readonly message: string;
    readonly methodName?: string;
    readonly timestamp: number;
    readonly retryable: boolean;
    readonly metadata?: Record<string, unknown>;
}

export class ApiClientError extends Error {
    readonly code: ApiErrorCode;
    readonly methodName?: string;
    readonly timestamp: number;
    readonly retryable: boolean;
    readonly metadata?: Record<string, unknown>;

    constructor(detail: ApiErrorDetail) {
        super(detail.message);
        this.name = "ApiClientError";
        this.code = detail.code;
        this.methodName = detail.methodName;
        this.timestamp = detail.timestamp;
        this.retryable = detail.retryable;
        this.metadata = detail.metadata;

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, new.target);
        }
    }

    toJSON(): ApiErrorDetail {
        return {
            code: this.code,
            message: this.message,
            methodName: this.methodName,
            timestamp: this.timestamp,
            retryable: this.retryable,
            metadata: this.metadata
        };
    }
}

// ============================================================================
// Concrete Kinds
// ============================================================================

export class InvalidParameterError extends ApiClientError {
    readonly parameter: string;

    constructor(parameter: string, reason: string, methodName?: string) {
        super({
            code: ApiErrorCode.INVALID_PARAMETER,
            message: `Invalid parameter "${parameter}": ${reason}`,
            methodName,
            timestamp: Date.now(),
            retryable: false,
            metadata: { parameter }
        });
        this.name = "InvalidParameterError";
        this.parameter = parameter;
    }
}

export class TransportError extends ApiClientError {
    readonly kind: TransportFailureKind;
    readonly httpStatus?: number;

    constructor(
        kind: TransportFailureKind,
        message: string,
        options: { methodName?: string; httpStatus?: number; cause?: unknown } = {}
    ) {
        super({
            code: ApiErrorCode.TRANSPORT_ERROR,
            message,
            methodName: options.methodName,
            timestamp: Date.now(),
            retryable: kind !== "HTTP_STATUS" || isRetryableStatusCode(options.httpStatus),
            metadata: {
                kind,
                ...(options.httpStatus !== undefined ? { httpStatus: options.httpStatus } : {})
            }
        });
        this.name = "TransportError";
        this.kind = kind;
        this.httpStatus = options.httpStatus;
        if (options.cause !== undefined) {
            this.cause = options.cause;
        }
    }
}

/**
 * The service rejected the request at the application level.
 * `comment` is the service's own text, e.g. "apiKey: Incorrect API key".
 */
export class ApiError extends ApiClientError {
    readonly comment: string;

    constructor(comment: string, methodName?: string) {
        super({
            code: ApiErrorCode.API_ERROR,
            message: comment ? `Codeforces API: ${comment}` : "Codeforces API: request failed",
            methodName,
            timestamp: Date.now(),
            retryable: isCallLimitComment(comment),
            metadata: { comment }
        });
        this.name = "ApiError";
        this.comment = comment;
    }
}

export class DecodeError extends ApiClientError {
    /** Dotted path of the offending field, `$` for the document itself */
    readonly fieldPath: string;

    constructor(fieldPath: string, reason: string, methodName?: string) {
        super({
            code: ApiErrorCode.DECODE_ERROR,
            message: `Cannot decode ${fieldPath}: ${reason}`,
            methodName,
            timestamp: Date.now(),
            retryable: false,
            metadata: { fieldPath }
        });
        this.name = "DecodeError";
        this.fieldPath = fieldPath;
    }
}

// ============================================================================
// Helpers
// ============================================================================

export function isRetryableStatusCode(status: number | undefined): boolean {
    if (status === undefined) return false;
    return status === 429 || status >= 500;
}

function isCallLimitComment(comment: string): boolean {
    return /call limit exceeded/i.test(comment);
}

/**
 * Create a TransportError from anything a transport may throw.
 */
export function createTransportError(error: unknown, methodName?: string): TransportError {
    if (error instanceof TransportError) {
        return error;
    }

    if (error instanceof Error) {
        const text = `${error.name} ${error.message} ${describeCause(error.cause)}`;

        if (text.includes("ECONNREFUSED")) {
            return new TransportError("CONNECTION_REFUSED", `Connection refused: ${error.message}`, {
                methodName,
                cause: error
            });
        }

        if (error.name === "AbortError" || error.name === "TimeoutError" ||
            text.includes("ETIMEDOUT") || /timeout/i.test(error.message)) {
            return new TransportError("TIMEOUT", "Request timeout", { methodName, cause: error });
        }

        return new TransportError("NETWORK_ERROR", error.message, { methodName, cause: error });
    }

    return new TransportError("NETWORK_ERROR", String(error), { methodName, cause: error });
}

function describeCause(cause: unknown): string {
    if (cause instanceof Error) {
        const code = "code" in cause ? String(cause.code) : "";
        return `${code} ${cause.message}`;
    }
    return "";
}
