/**
 * Canonical Parameter Encoder
 *
 * Turns a command's named parameters into the sorted, percent-encoded
 * sequence that is both hashed for the signature and sent on the wire.
 * Output is a pure function of the logical parameter set: same params,
 * same bytes.
 */

import { InvalidParameterError } from "../errors/ApiClientError.js";

// ============================================================================
// Types
// ============================================================================

export type ParameterValue = string | number | boolean | readonly string[];

export type ParameterMap = ReadonlyMap<string, ParameterValue>;

export interface EncodedParameter {
    readonly name: string;
    readonly value: string;
}

export interface EncodeOptions {
    /** Joins list values into one parameter (default ",") */
    readonly listSeparator?: string;
}

export const DEFAULT_LIST_SEPARATOR = ",";

/** Added by the signer; commands may not set them */
export const RESERVED_PARAMETERS: readonly string[] = ["apiKey", "time", "apiSig"];

// ============================================================================
// Validation
// ============================================================================

/**
 * Reject a parameter the encoder cannot represent faithfully.
 */
export function assertValidParameter(name: string, value: ParameterValue, methodName?: string): void {
    if (name.length === 0) {
        throw new InvalidParameterError(name, "parameter name must not be empty", methodName);
    }

    if (typeof value === "number" && !Number.isSafeInteger(value)) {
        throw new InvalidParameterError(name, `expected an integer, got ${value}`, methodName);
    }

    if (Array.isArray(value) && value.some(item => typeof item !== "string")) {
        throw new InvalidParameterError(name, "list items must be strings", methodName);
    }
}

// ============================================================================
// Encoding
// ============================================================================

export function serializeValue(value: ParameterValue, listSeparator: string = DEFAULT_LIST_SEPARATOR): string {
    if (typeof value === "string") return value;
    if (typeof value === "boolean") return value ? "true" : "false";
    if (typeof value === "number") return value.toString();
    return value.join(listSeparator);
}

/**
 * Order by name, then by value. Plain code-unit comparison keeps the
 * order identical to the one the service recomputes.
 */
export function compareEncoded(a: EncodedParameter, b: EncodedParameter): number {
    if (a.name !== b.name) return a.name < b.name ? -1 : 1;
    if (a.value !== b.value) return a.value < b.value ? -1 : 1;
    return 0;
}

export function encodeParameters(
    params: Iterable<readonly [string, ParameterValue]>,
    options: EncodeOptions = {}
): EncodedParameter[] {
    const listSeparator = options.listSeparator ?? DEFAULT_LIST_SEPARATOR;
    const seen = new Set<string>();
    const encoded: EncodedParameter[] = [];

    for (const [name, value] of params) {
        assertValidParameter(name, value);
        if (seen.has(name)) {
            throw new InvalidParameterError(name, "duplicate parameter name");
        }
        seen.add(name);

        encoded.push({
            name: encodeURIComponent(name),
            value: encodeURIComponent(serializeValue(value, listSeparator))
        });
    }

    return encoded.sort(compareEncoded);
}

export function toQueryString(pairs: readonly EncodedParameter[]): string {
    return pairs.map(p => `${p.name}=${p.value}`).join("&");
}

/**
 * Split a query string back into its encoded pairs, keeping their order.
 */
export function parseQueryString(query: string): EncodedParameter[] {
    const stripped = query.startsWith("?") ? query.slice(1) : query;
    if (stripped.length === 0) return [];

    return stripped.split("&").map(part => {
        const eq = part.indexOf("=");
        return eq === -1
            ? { name: part, value: "" }
            : { name: part.slice(0, eq), value: part.slice(eq + 1) };
    });
}
