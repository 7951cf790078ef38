import { createHash } from "node:crypto";
import type { OpsRequestEvent, RequestEventType } from "../events/ops_request_event.js";

export type RequestEventInput = Omit<OpsRequestEvent, "event_type" | "event_id">;

/**
 * buildRequestEvent: Deterministically turns a dispatch outcome into an OPS event.
 */
export function buildRequestEvent(input: RequestEventInput): OpsRequestEvent {
    const eventType: RequestEventType =
        input.outcome === "DECODED" || input.outcome === "RAW"
            ? "API_REQUEST_COMPLETED"
            : "API_REQUEST_FAILED";

    const eventId = createHash("sha256")
        .update(`${input.method_name}:${input.signed_at ?? "unsigned"}:${input.outcome}:${input.api_key}`)
        .digest("hex")
        .substring(0, 16);

    return Object.freeze({
        event_type: eventType,
        event_id: eventId,
        ...input
    });
}

/**
 * emitRequestEvent: Default sink: one `[OPS_EVENT]` line on stdout.
 */
export function emitRequestEvent(event: OpsRequestEvent): void {
    console.log(`[OPS_EVENT] ${JSON.stringify(event)}`);
}
