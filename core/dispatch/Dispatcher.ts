/**
 * Dispatcher
 *
 * Runs one command through the whole call:
 *
 *   Built -> Encoded -> Signed -> Sent -> Decoded
 *                                      -> TransportError | ApiError | DecodeError
 *
 * Every failure of the four API kinds comes back as `{ ok: false, error }`;
 * nothing is retried. A broken clock or nonce source is not one of those
 * kinds and rejects the returned promise instead.
 */

import type { ApiCommand } from "../commands/ApiCommand.js";
import type { ApiCredentials } from "../credentials/ApiCredentials.js";
import { maskApiKey } from "../credentials/ApiCredentials.js";
import { ApiClientError, createTransportError } from "../errors/ApiClientError.js";
import type { OpsRequestEvent, RequestEventSink } from "../events/ops_request_event.js";
import { buildRequestEvent, emitRequestEvent } from "../ops/emit_request_event.js";
import { decodeResponse } from "../responses/ResponseDecoder.js";
import type { ResultTag, TaggedResult } from "../responses/result_types.js";
import type { Clock, NonceSource } from "../signing/collaborators.js";
import { DEFAULT_API_BASE_URL, RequestSigner, type SignedRequest } from "../signing/RequestSigner.js";
import type { Transport, TransportRequest, TransportResponse } from "../transport/Transport.js";

// ============================================================================
// Types
// ============================================================================

export type DispatchOutcome<T extends ResultTag> =
    | { readonly ok: true; readonly result: TaggedResult<T> }
    | { readonly ok: false; readonly error: ApiClientError };

export type RawDispatchOutcome =
    | { readonly ok: true; readonly status: number; readonly body: string }
    | { readonly ok: false; readonly error: ApiClientError };

export interface DispatchOptions {
    /** Defaults to https://codeforces.com/api/ */
    readonly baseUrl?: string;
    readonly clock?: Clock;
    readonly nonceSource?: NonceSource;
    readonly listSeparator?: string;
    /** Receives one event per call; null turns events off */
    readonly onEvent?: RequestEventSink | null;
}

export interface PreparedRequest {
    readonly signed: SignedRequest;
    readonly request: TransportRequest;
}

// ============================================================================
// Pure Part
// ============================================================================

/**
 * Command -> signed GET request. No I/O.
 */
export function buildSignedRequest(
    command: ApiCommand,
    credentials: ApiCredentials,
    options: DispatchOptions = {}
): PreparedRequest {
    const signer = new RequestSigner(credentials, {
        clock: options.clock,
        nonceSource: options.nonceSource,
        listSeparator: options.listSeparator
    });

    const signed = signer.sign(command.methodName(), command.parameters());

    return {
        signed,
        request: {
            url: signer.buildSignedUrl(options.baseUrl ?? DEFAULT_API_BASE_URL, signed),
            methodName: signed.methodName,
            query: [...signed.parameters, { name: "apiSig", value: signed.apiSig }]
        }
    };
}

// ============================================================================
// Execution
// ============================================================================

export async function execute<T extends ResultTag>(
    command: ApiCommand<T>,
    credentials: ApiCredentials,
    transport: Transport,
    options: DispatchOptions = {}
): Promise<DispatchOutcome<T>> {
    const call = new CallReport(command, credentials, options);

    try {
        const prepared = call.markSigned(buildSignedRequest(command, credentials, options));
        const response = await send(transport, prepared.request);
        const result = decodeResponse(response.body, command.expectedResultTag(), {
            methodName: prepared.signed.methodName,
            httpStatus: response.status
        });

        call.finish("DECODED");
        return { ok: true, result };
    } catch (error) {
        if (error instanceof ApiClientError) {
            call.finish(error.code, error.message);
            return { ok: false, error };
        }
        throw error;
    }
}

/**
 * Same request as `execute`, but the body comes back undecoded.
 */
export async function executeRaw(
    command: ApiCommand,
    credentials: ApiCredentials,
    transport: Transport,
    options: DispatchOptions = {}
): Promise<RawDispatchOutcome> {
    const call = new CallReport(command, credentials, options);

    try {
        const prepared = call.markSigned(buildSignedRequest(command, credentials, options));
        const response = await send(transport, prepared.request);

        call.finish("RAW");
        return {
            ok: true,
            status: response.status,
            body: Buffer.from(response.body).toString("utf8")
        };
    } catch (error) {
        if (error instanceof ApiClientError) {
            call.finish(error.code, error.message);
            return { ok: false, error };
        }
        throw error;
    }
}

async function send(transport: Transport, request: TransportRequest): Promise<TransportResponse> {
    try {
        return await transport.get(request);
    } catch (error) {
        throw createTransportError(error, request.methodName);
    }
}

/**
 * Collects what one call's event needs and hands it to the sink.
 */
class CallReport {
    readonly #command: ApiCommand;
    readonly #apiKey: string;
    readonly #sink: RequestEventSink | null;
    readonly #startedAt = Date.now();
    #signedAt?: number;

    constructor(command: ApiCommand, credentials: ApiCredentials, options: DispatchOptions) {
        this.#command = command;
        this.#apiKey = maskApiKey(credentials.apiKey);
        this.#sink = options.onEvent === undefined ? emitRequestEvent : options.onEvent;
    }

    markSigned(prepared: PreparedRequest): PreparedRequest {
        this.#signedAt = prepared.signed.time;
        return prepared;
    }

    finish(outcome: OpsRequestEvent["outcome"], errorMessage?: string): void {
        if (!this.#sink) return;

        this.#sink(buildRequestEvent({
            method_name: this.#command.methodName(),
            api_key: this.#apiKey,
            outcome,
            result_tag: this.#command.expectedResultTag(),
            error_message: errorMessage,
            duration_ms: Date.now() - this.#startedAt,
            signed_at: this.#signedAt
        }));
    }
}

// ============================================================================
// Dispatcher
// ============================================================================

/**
 * Binds a transport and collaborators so callers pass only command and
 * credentials.
 */
export class Dispatcher {
    readonly #transport: Transport;
    readonly #options: DispatchOptions;

    constructor(transport: Transport, options: DispatchOptions = {}) {
        this.#transport = transport;
        this.#options = options;
    }

    execute<T extends ResultTag>(command: ApiCommand<T>, credentials: ApiCredentials): Promise<DispatchOutcome<T>> {
        return execute(command, credentials, this.#transport, this.#options);
    }

    executeRaw(command: ApiCommand, credentials: ApiCredentials): Promise<RawDispatchOutcome> {
        return executeRaw(command, credentials, this.#transport, this.#options);
    }

    buildSignedRequest(command: ApiCommand, credentials: ApiCredentials): PreparedRequest {
        return buildSignedRequest(command, credentials, this.#options);
    }
}
