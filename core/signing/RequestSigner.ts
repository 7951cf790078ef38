/**
 * Codeforces API Request Signer
 *
 * Every authenticated request carries:
 * - apiKey: the public key
 * - time: unix seconds at signing time
 * - apiSig: nonce + hex(SHA-512("<nonce>/<method>?<canonical params>#<secret>"))
 *
 * `apiKey` and `time` are part of the canonical params, so they are fixed
 * before the hash is taken. The query sent is the hashed one plus apiSig.
 */

import crypto from "node:crypto";
import type { ApiCredentials } from "../credentials/ApiCredentials.js";
import { InvalidParameterError } from "../errors/ApiClientError.js";
import {
    type EncodedParameter,
    type ParameterValue,
    RESERVED_PARAMETERS,
    encodeParameters,
    toQueryString
} from "./ParameterEncoder.js";
import { type Clock, type NonceSource, NONCE_LENGTH, randomNonce, systemClock } from "./collaborators.js";

export const DEFAULT_API_BASE_URL = "https://codeforces.com/api/";

export interface SignedRequest {
    readonly methodName: string;
    readonly time: number;
    readonly nonce: string;
    /** Sorted, encoded params including apiKey and time (the hashed set) */
    readonly parameters: readonly EncodedParameter[];
    readonly apiSig: string;
    /** Canonical query followed by `&apiSig=...` */
    readonly queryString: string;
}

export interface RequestSignerOptions {
    readonly clock?: Clock;
    readonly nonceSource?: NonceSource;
    readonly listSeparator?: string;
}

/**
 * Hex SHA-512 digest prefixed with its nonce.
 */
export function computeSignature(
    nonce: string,
    methodName: string,
    canonicalQuery: string,
    apiSecret: string
): string {
    const digest = crypto
        .createHash("sha512")
        .update(`${nonce}/${methodName}?${canonicalQuery}#${apiSecret}`, "utf8")
        .digest("hex");
    return nonce + digest;
}

export class RequestSigner {
    readonly #apiKey: string;
    readonly #apiSecret: string;
    readonly #clock: Clock;
    readonly #nonceSource: NonceSource;
    readonly #listSeparator?: string;

    constructor(credentials: ApiCredentials, options: RequestSignerOptions = {}) {
        this.#apiKey = credentials.apiKey;
        this.#apiSecret = credentials.apiSecret;
        this.#clock = options.clock ?? systemClock;
        this.#nonceSource = options.nonceSource ?? randomNonce;
        this.#listSeparator = options.listSeparator;
    }

    get apiKey(): string {
        return this.#apiKey;
    }

    /**
     * Sign a method call. The params must not already contain apiKey, time
     * or apiSig.
     */
    sign(methodName: string, params: Iterable<readonly [string, ParameterValue]>): SignedRequest {
        const entries = [...params];
        for (const [name] of entries) {
            if (RESERVED_PARAMETERS.includes(name)) {
                throw new InvalidParameterError(name, "reserved for request signing", methodName);
            }
        }

        const time = this.readClock();
        const signingEntries: Array<readonly [string, ParameterValue]> = [
            ...entries,
            ["apiKey", this.#apiKey],
            ["time", time]
        ];
        const parameters = encodeParameters(signingEntries, { listSeparator: this.#listSeparator });
        const canonicalQuery = toQueryString(parameters);

        const nonce = this.#nonceSource();
        if (nonce.length !== NONCE_LENGTH || !/^\d+$/.test(nonce)) {
            throw new Error(`Nonce must be ${NONCE_LENGTH} decimal digits, got "${nonce}"`);
        }

        const apiSig = computeSignature(nonce, methodName, canonicalQuery, this.#apiSecret);

        return {
            methodName,
            time,
            nonce,
            parameters,
            apiSig,
            queryString: `${canonicalQuery}&apiSig=${apiSig}`
        };
    }

    /**
     * Recompute the signature of a signed request from its own parameters.
     */
    verify(signed: SignedRequest): boolean {
        const nonce = signed.apiSig.slice(0, NONCE_LENGTH);
        const expected = computeSignature(
            nonce,
            signed.methodName,
            toQueryString(signed.parameters),
            this.#apiSecret
        );

        const a = Buffer.from(expected, "utf8");
        const b = Buffer.from(signed.apiSig, "utf8");
        return a.length === b.length && crypto.timingSafeEqual(a, b);
    }

    /**
     * Full GET URL for a signed request.
     */
    buildSignedUrl(baseUrl: string, signed: SignedRequest): string {
        return `${baseUrl.replace(/\/+$/u, "")}/${signed.methodName}?${signed.queryString}`;
    }

    private readClock(): number {
        const time = this.#clock();
        if (!Number.isSafeInteger(time) || time < 0) {
            throw new Error(`Clock returned an invalid unix time: ${time}`);
        }
        return time;
    }
}
