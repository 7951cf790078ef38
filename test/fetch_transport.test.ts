import assert from "node:assert/strict";
import test from "node:test";
import { TransportError } from "../core/errors/ApiClientError.js";
import { FetchTransport } from "../core/transport/FetchTransport.js";
import type { TransportRequest } from "../core/transport/Transport.js";

const request: TransportRequest = {
    url: "https://codeforces.com/api/contest.list?apiKey=test-key&time=1700000000&apiSig=123456abc",
    methodName: "contest.list",
    query: []
};

test("the response status and body bytes are passed through", async () => {
    const seen: Array<{ url: string; init: RequestInit | undefined }> = [];
    const transport = new FetchTransport({
        fetch: async (input, init) => {
            seen.push({ url: String(input), init });
            return new Response('{"status":"FAILED","comment":"x"}', { status: 400 });
        }
    });

    const response = await transport.get(request);

    assert.equal(response.status, 400);
    assert.equal(Buffer.from(response.body).toString("utf8"), '{"status":"FAILED","comment":"x"}');
    assert.equal(seen[0]?.url, request.url);
    assert.equal(seen[0]?.init?.method, "GET");
});

test("a request that outlives the timeout fails as TIMEOUT", async () => {
    const transport = new FetchTransport({
        timeoutMs: 10,
        fetch: (_input, init) =>
            new Promise<Response>((_resolve, reject) => {
                init?.signal?.addEventListener("abort", () => {
                    const error = new Error("This operation was aborted");
                    error.name = "AbortError";
                    reject(error);
                });
            })
    });

    await assert.rejects(
        transport.get(request),
        (error: unknown) =>
            error instanceof TransportError &&
            error.kind === "TIMEOUT" &&
            error.message === "Request timeout after 10ms" &&
            error.methodName === "contest.list"
    );
});

test("other fetch failures are classified", async () => {
    const transport = new FetchTransport({
        fetch: async () => {
            throw new TypeError("fetch failed", {
                cause: Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:443"), { code: "ECONNREFUSED" })
            });
        }
    });

    await assert.rejects(
        transport.get(request),
        (error: unknown) => error instanceof TransportError && error.kind === "CONNECTION_REFUSED"
    );
});
