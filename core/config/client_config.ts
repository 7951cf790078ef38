/**
 * Client Configuration
 *
 * Where requests go and how they are sent. Credentials are loaded
 * separately (see ApiCredentials.ts).
 */

import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import { DEFAULT_LIST_SEPARATOR } from "../signing/ParameterEncoder.js";
import { DEFAULT_API_BASE_URL } from "../signing/RequestSigner.js";
import { DEFAULT_REQUEST_TIMEOUT_MS } from "../transport/FetchTransport.js";

// ============================================================================
// Types
// ============================================================================

export interface ClientConfig {
    /** API root, method names are appended to it */
    readonly baseUrl: string;

    /** Per-request timeout of the fetch transport (ms) */
    readonly requestTimeoutMs: number;

    /** Joins list parameters such as `handles` */
    readonly listSeparator: string;

    /** Print one [OPS_EVENT] line per request */
    readonly emitEvents: boolean;
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_CLIENT_CONFIG: ClientConfig = {
    baseUrl: DEFAULT_API_BASE_URL,
    requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
    listSeparator: DEFAULT_LIST_SEPARATOR,
    emitEvents: true
};

// ============================================================================
// Config Loader
// ============================================================================

/**
 * Load a .env file into process.env. Existing variables win.
 * Returns false when there is no file at the path.
 */
export function loadEnvFile(envPath: string = path.resolve(process.cwd(), ".env")): boolean {
    if (!fs.existsSync(envPath)) {
        return false;
    }

    const result = dotenv.config({ path: envPath });
    if (result.error) {
        throw result.error;
    }
    return true;
}

/**
 * Load client config from environment variables.
 */
export function loadClientConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ClientConfig {
    const timeoutRaw = env.CODEFORCES_REQUEST_TIMEOUT_MS;

    return {
        baseUrl: env.CODEFORCES_API_BASE_URL || DEFAULT_CLIENT_CONFIG.baseUrl,
        requestTimeoutMs: timeoutRaw ? parseInt(timeoutRaw, 10) : DEFAULT_CLIENT_CONFIG.requestTimeoutMs,
        listSeparator: env.CODEFORCES_LIST_SEPARATOR || DEFAULT_CLIENT_CONFIG.listSeparator,
        emitEvents: env.CODEFORCES_EMIT_EVENTS !== "0"
    };
}

// ============================================================================
// Config Validation
// ============================================================================

export interface ConfigValidationResult {
    readonly valid: boolean;
    readonly errors: readonly string[];
    readonly warnings: readonly string[];
}

export function validateClientConfig(config: ClientConfig): ConfigValidationResult {
    const errors: string[] = [];
    const warnings: string[] = [];

    let url: URL | null = null;
    try {
        url = new URL(config.baseUrl);
    } catch {
        errors.push(`baseUrl is not a valid URL: ${config.baseUrl}`);
    }

    if (url && url.protocol !== "https:" && url.protocol !== "http:") {
        errors.push(`baseUrl must use http or https, got ${url.protocol}`);
    }
    if (url && url.protocol === "http:") {
        warnings.push("baseUrl uses plain http - API keys travel unencrypted");
    }
    if (url && (url.search || url.hash)) {
        errors.push("baseUrl must not carry a query string or fragment");
    }

    if (!Number.isInteger(config.requestTimeoutMs) || config.requestTimeoutMs <= 0) {
        errors.push("requestTimeoutMs must be a positive integer");
    }

    if (config.listSeparator.length !== 1) {
        errors.push("listSeparator must be a single character");
    } else if (/[&=#?]/.test(config.listSeparator)) {
        errors.push("listSeparator must not be a URL delimiter");
    }

    return {
        valid: errors.length === 0,
        errors,
        warnings
    };
}
