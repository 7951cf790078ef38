/**
 * API Command - capability interface and base class
 *
 * A command names one remote method, owns its parameters and declares the
 * result tag its response decodes into. The dispatcher and decoder only
 * ever see this interface, so new methods need no change there.
 */

import {
    assertValidParameter,
    RESERVED_PARAMETERS,
    type ParameterMap,
    type ParameterValue
} from "../signing/ParameterEncoder.js";
import { InvalidParameterError } from "../errors/ApiClientError.js";
import type { ResultTag } from "../responses/result_types.js";

// ============================================================================
// Capability Interface
// ============================================================================

export interface ApiCommand<T extends ResultTag = ResultTag> {
    /** Remote method, e.g. "blogEntry.view" */
    methodName(): string;

    /** Parameters to send. Unset optional parameters are absent. */
    parameters(): ParameterMap;

    /** Result tag the response decodes into */
    expectedResultTag(): T;
}

/** Parameter bag as written by a command; undefined entries are dropped */
export type ParameterInput = Readonly<Record<string, ParameterValue | undefined>>;

// ============================================================================
// Base Class
// ============================================================================

export abstract class BaseCommand<T extends ResultTag> implements ApiCommand<T> {
    readonly #methodName: string;
    readonly #resultTag: T;
    readonly #parameters: ParameterMap;

    protected constructor(methodName: string, resultTag: T, params: ParameterInput = {}) {
        this.#methodName = methodName;
        this.#resultTag = resultTag;
        this.#parameters = buildParameterMap(methodName, params);
    }

    methodName(): string {
        return this.#methodName;
    }

    parameters(): ParameterMap {
        return this.#parameters;
    }

    expectedResultTag(): T {
        return this.#resultTag;
    }

    toString(): string {
        const params = [...this.#parameters].map(([k, v]) => `${k}=${String(v)}`).join(", ");
        return `${this.#methodName}(${params})`;
    }
}

/**
 * Validate parameters and drop the unset ones. Lists are copied so later
 * mutation of the caller's array cannot change a built command.
 */
export function buildParameterMap(methodName: string, params: ParameterInput): ParameterMap {
    const map = new Map<string, ParameterValue>();

    for (const [name, value] of Object.entries(params)) {
        if (value === undefined) continue;

        if (RESERVED_PARAMETERS.includes(name)) {
            throw new InvalidParameterError(name, "reserved for request signing", methodName);
        }
        assertValidParameter(name, value, methodName);

        map.set(name, typeof value === "object" ? Object.freeze([...value]) : value);
    }

    return map;
}

/**
 * Command for a method this library has no dedicated class for.
 */
export class CustomCommand<T extends ResultTag> extends BaseCommand<T> {
    constructor(methodName: string, resultTag: T, params: ParameterInput = {}) {
        if (methodName.trim().length === 0) {
            throw new InvalidParameterError("methodName", "method name must not be empty");
        }
        super(methodName, resultTag, params);
    }
}
