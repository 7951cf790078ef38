/**
 * Transport over the global fetch, with a per-request timeout.
 */

import { createTransportError, TransportError } from "../errors/ApiClientError.js";
import type { Transport, TransportRequest, TransportResponse } from "./Transport.js";

export const DEFAULT_REQUEST_TIMEOUT_MS = 10000;

export interface FetchTransportOptions {
    readonly timeoutMs?: number;
    /** Defaults to the global fetch */
    readonly fetch?: typeof fetch;
    readonly headers?: Record<string, string>;
}

export class FetchTransport implements Transport {
    readonly #timeoutMs: number;
    readonly #fetch: typeof fetch;
    readonly #headers: Record<string, string>;

    constructor(options: FetchTransportOptions = {}) {
        this.#timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
        this.#fetch = options.fetch ?? fetch;
        this.#headers = { Accept: "application/json", ...options.headers };
    }

    async get(request: TransportRequest): Promise<TransportResponse> {
        const controller = new AbortController();
        const timeout = setTimeout(() => controller.abort(), this.#timeoutMs);

        try {
            const response = await this.#fetch(request.url, {
                method: "GET",
                headers: this.#headers,
                signal: controller.signal
            });
            const body = new Uint8Array(await response.arrayBuffer());

            return { status: response.status, body };
        } catch (error) {
            if (error instanceof Error && error.name === "AbortError") {
                throw new TransportError("TIMEOUT", `Request timeout after ${this.#timeoutMs}ms`, {
                    methodName: request.methodName,
                    cause: error
                });
            }
            throw createTransportError(error, request.methodName);
        } finally {
            clearTimeout(timeout);
        }
    }
}
