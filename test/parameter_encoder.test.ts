import assert from "node:assert/strict";
import test from "node:test";
import { InvalidParameterError } from "../core/errors/ApiClientError.js";
import {
    compareEncoded,
    encodeParameters,
    parseQueryString,
    serializeValue,
    toQueryString,
    type ParameterValue
} from "../core/signing/ParameterEncoder.js";

test("parameters come out sorted by name whatever the insertion order", () => {
    const encoded = encodeParameters([
        ["time", 1700000000],
        ["handles", ["alice"]],
        ["apiKey", "k"],
        ["count", 5]
    ]);

    assert.deepEqual(encoded.map(p => p.name), ["apiKey", "count", "handles", "time"]);
});

test("sorting uses code-unit order, uppercase before lowercase", () => {
    const encoded = encodeParameters([
        ["b", "1"],
        ["B", "2"],
        ["a", "3"]
    ]);

    assert.equal(toQueryString(encoded), "B=2&a=3&b=1");
});

test("equal names are ordered by value", () => {
    assert.equal(compareEncoded({ name: "x", value: "a" }, { name: "x", value: "b" }), -1);
    assert.equal(compareEncoded({ name: "x", value: "b" }, { name: "x", value: "a" }), 1);
    assert.equal(compareEncoded({ name: "x", value: "a" }, { name: "x", value: "a" }), 0);
    assert.equal(compareEncoded({ name: "a", value: "z" }, { name: "b", value: "a" }), -1);
});

test("encoding the same logical parameter set twice yields identical output", () => {
    const entries: Array<readonly [string, ParameterValue]> = [
        ["contestId", 566],
        ["showUnofficial", true],
        ["handles", ["alice", "bob"]]
    ];

    const first = toQueryString(encodeParameters(entries));
    const second = toQueryString(encodeParameters([...entries].reverse()));

    assert.equal(first, second);
    assert.equal(first, "contestId=566&handles=alice%2Cbob&showUnofficial=true");
});

test("values are percent-encoded with the URI component rules", () => {
    const encoded = encodeParameters([
        ["problemsetName", "a b&c=d"],
        ["handle", "tourist"],
        ["tags", ["2-sat", "dp"]]
    ]);

    assert.deepEqual(encoded, [
        { name: "handle", value: "tourist" },
        { name: "problemsetName", value: "a%20b%26c%3Dd" },
        { name: "tags", value: "2-sat%2Cdp" }
    ]);
});

test("list separator can be changed", () => {
    const encoded = encodeParameters([["handles", ["alice", "bob"]]], { listSeparator: ";" });

    assert.deepEqual(encoded, [{ name: "handles", value: "alice%3Bbob" }]);
});

test("scalar values serialize to their decimal or literal form", () => {
    assert.equal(serializeValue(82347), "82347");
    assert.equal(serializeValue(-3), "-3");
    assert.equal(serializeValue(true), "true");
    assert.equal(serializeValue(false), "false");
    assert.equal(serializeValue(["a", "b", "c"], ";"), "a;b;c");
    assert.equal(serializeValue([]), "");
});

test("an empty parameter name is rejected", () => {
    assert.throws(
        () => encodeParameters([["", "x"]]),
        (error: unknown) => error instanceof InvalidParameterError && error.parameter === ""
    );
});

test("a duplicate parameter name is rejected", () => {
    assert.throws(
        () => encodeParameters([["handle", "a"], ["handle", "b"]]),
        (error: unknown) =>
            error instanceof InvalidParameterError &&
            error.message === 'Invalid parameter "handle": duplicate parameter name'
    );
});

test("non-integer numbers are rejected", () => {
    assert.throws(() => encodeParameters([["count", 1.5]]), InvalidParameterError);
    assert.throws(() => encodeParameters([["count", Number.NaN]]), InvalidParameterError);
});

test("an empty parameter set encodes to an empty query", () => {
    assert.deepEqual(encodeParameters([]), []);
    assert.equal(toQueryString([]), "");
});

test("query strings split back into their encoded pairs", () => {
    assert.deepEqual(parseQueryString("?a=1&b=&c=x%3Dy&flag"), [
        { name: "a", value: "1" },
        { name: "b", value: "" },
        { name: "c", value: "x%3Dy" },
        { name: "flag", value: "" }
    ]);
    assert.deepEqual(parseQueryString(""), []);
});
