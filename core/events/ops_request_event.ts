/**
 * OpsRequestEvent: Observability event for one signed API call.
 * Carries no secret and no signature; the API key is masked.
 */

import type { ApiErrorCode } from "../errors/ApiClientError.js";
import type { ResultTag } from "../responses/result_types.js";

export type RequestEventType = "API_REQUEST_COMPLETED" | "API_REQUEST_FAILED";

export interface OpsRequestEvent {
    /** Event type identifier */
    readonly event_type: RequestEventType;

    /** Deterministic event ID (SHA-256, 16 chars) */
    readonly event_id: string;

    /** Remote method, e.g. "user.info" */
    readonly method_name: string;

    /** Masked API key */
    readonly api_key: string;

    /** DECODED, RAW, or the error code */
    readonly outcome: "DECODED" | "RAW" | ApiErrorCode;

    /** Result tag the command declared */
    readonly result_tag?: ResultTag;

    readonly error_message?: string;

    /** Wall time spent in the transport and decoder */
    readonly duration_ms: number;

    /** Unix seconds sent as `time`; absent when signing never happened */
    readonly signed_at?: number;
}

export type RequestEventSink = (event: OpsRequestEvent) => void;
