/**
 * Transport collaborator
 *
 * The only side-effecting boundary of the client: it receives a fully
 * signed GET request and returns the raw response. Any HTTP client can
 * implement it.
 */

import type { EncodedParameter } from "../signing/ParameterEncoder.js";

export interface TransportRequest {
    /** Complete URL, query string included */
    readonly url: string;
    readonly methodName: string;
    /** The query as ordered pairs, apiSig last */
    readonly query: readonly EncodedParameter[];
}

export interface TransportResponse {
    readonly status: number;
    readonly body: Uint8Array;
}

export interface Transport {
    /**
     * Perform the GET. Rejects only when no response was received;
     * an HTTP error status still resolves.
     */
    get(request: TransportRequest): Promise<TransportResponse>;
}
