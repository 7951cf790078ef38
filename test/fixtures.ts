/**
 * Shared test fixtures: placeholder credentials, payload builders and an
 * in-process transport.
 */

import type { Transport, TransportRequest, TransportResponse } from "../core/transport/Transport.js";

export const TEST_CREDENTIALS = { apiKey: "test-key", apiSecret: "test-secret" };

export const TEST_TIME = 1700000000;
export const TEST_NONCE = "123456";

/** sha512 of "123456/blogEntry.view?apiKey=test-key&blogEntryId=82347&time=1700000000#test-secret" */
export const GOLDEN_DIGEST =
    "d3f19c1dfef4d2aecd19b71dda740fb29c6122e89a87b193b01d1c440c8e63a42209b4b3a9e35eed3f2491b6271ae7a905af41d4c319d2d9c19ffdebe0b9c05c";

export const GOLDEN_API_SIG = TEST_NONCE + GOLDEN_DIGEST;

// ============================================================================
// Payloads
// ============================================================================

type Payload = Record<string, unknown>;

export function blogEntryPayload(overrides: Payload = {}): Payload {
    return {
        id: 82347,
        originalLocale: "en",
        creationTimeSeconds: 1599000000,
        authorHandle: "sample_author",
        title: "Sample round announcement",
        content: "<p>hello</p>",
        locale: "en",
        modificationTimeSeconds: 1599000100,
        allowViewHistory: true,
        tags: ["announcement"],
        rating: 42,
        ...overrides
    };
}

export function userPayload(handle: string, overrides: Payload = {}): Payload {
    return {
        handle,
        contribution: 0,
        rank: "expert",
        rating: 1650,
        lastOnlineTimeSeconds: 1699990000,
        registrationTimeSeconds: 1500000000,
        friendOfCount: 3,
        avatar: "https://example.test/avatar.jpg",
        titlePhoto: "https://example.test/photo.jpg",
        ...overrides
    };
}

export function problemPayload(overrides: Payload = {}): Payload {
    return {
        contestId: 1485,
        index: "A",
        name: "Add and Divide",
        type: "PROGRAMMING",
        points: 500,
        rating: 1000,
        tags: ["greedy", "math"],
        ...overrides
    };
}

export function partyPayload(members: Payload[] = [{ handle: "alice" }]): Payload {
    return {
        contestId: 1485,
        members,
        participantType: "CONTESTANT",
        ghost: false,
        startTimeSeconds: 1613500000
    };
}

export function submissionPayload(overrides: Payload = {}): Payload {
    return {
        id: 107000001,
        contestId: 1485,
        creationTimeSeconds: 1613500500,
        relativeTimeSeconds: 500,
        problem: problemPayload(),
        author: partyPayload(),
        programmingLanguage: "GNU C++17",
        verdict: "OK",
        testset: "TESTS",
        passedTestCount: 12,
        timeConsumedMillis: 31,
        memoryConsumedBytes: 0,
        ...overrides
    };
}

export function okBody(result: unknown): string {
    return JSON.stringify({ status: "OK", result });
}

export function failedBody(comment: string): string {
    return JSON.stringify({ status: "FAILED", comment });
}

// ============================================================================
// Transport
// ============================================================================

export function textResponse(body: string, status = 200): TransportResponse {
    return { status, body: new Uint8Array(Buffer.from(body, "utf8")) };
}

/**
 * Records every request and answers from a queue. A string is a 200 body;
 * an Error is thrown as the transport failure.
 */
export class StubTransport implements Transport {
    readonly requests: TransportRequest[] = [];
    readonly #responses: Array<TransportResponse | Error>;

    constructor(...responses: Array<TransportResponse | Error | string>) {
        this.#responses = responses.map(r => (typeof r === "string" ? textResponse(r) : r));
    }

    async get(request: TransportRequest): Promise<TransportResponse> {
        this.requests.push(request);
        const next = this.#responses.shift();
        if (next === undefined) {
            throw new Error("StubTransport has no response left");
        }
        if (next instanceof Error) {
            throw next;
        }
        return next;
    }
}
