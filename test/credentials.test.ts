import assert from "node:assert/strict";
import test from "node:test";
import {
    loadCredentialsFromEnv,
    maskApiKey,
    maskCredentials,
    validateCredentials
} from "../core/credentials/ApiCredentials.js";

test("credentials load from the environment, trimmed", () => {
    assert.deepEqual(
        loadCredentialsFromEnv({ CODEFORCES_API_KEY: " test-key ", CODEFORCES_API_SECRET: "test-secret\n" }),
        { apiKey: "test-key", apiSecret: "test-secret" }
    );
});

test("missing or blank credentials load as null", () => {
    assert.equal(loadCredentialsFromEnv({}), null);
    assert.equal(loadCredentialsFromEnv({ CODEFORCES_API_KEY: "test-key" }), null);
    assert.equal(loadCredentialsFromEnv({ CODEFORCES_API_KEY: "test-key", CODEFORCES_API_SECRET: "  " }), null);
});

test("well-formed credentials validate", () => {
    assert.deepEqual(validateCredentials({ apiKey: "test-key", apiSecret: "test-secret" }), {
        valid: true,
        errors: []
    });
});

test("empty, malformed and placeholder credentials are reported", () => {
    assert.deepEqual(validateCredentials({ apiKey: "", apiSecret: "" }).errors, [
        "API key is missing",
        "API secret is missing"
    ]);
    assert.deepEqual(validateCredentials({ apiKey: "test key", apiSecret: "test-secret" }).errors, [
        "API key contains whitespace or URL delimiters"
    ]);
    assert.deepEqual(validateCredentials({ apiKey: "test-key", apiSecret: "<api_secret>" }).errors, [
        "Credentials contain placeholder values"
    ]);
});

test("keys are masked to their first and last four characters", () => {
    assert.equal(maskApiKey("abcdefghijkl"), "abcd...ijkl");
    assert.equal(maskApiKey("test-key"), "****");
    assert.deepEqual(maskCredentials({ apiKey: "abcdefghijkl", apiSecret: "test-secret" }), { apiKey: "abcd...ijkl" });
});
