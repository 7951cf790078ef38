/**
 * API Credentials
 *
 * Key/secret pair used to sign every request. The key travels with the
 * request as `apiKey`; the secret is only ever hash input.
 * Loaded from environment variables only - never from files.
 */

export interface ApiCredentials {
    readonly apiKey: string;
    readonly apiSecret: string;
}

export interface CredentialValidationResult {
    readonly valid: boolean;
    readonly errors: string[];
}

/**
 * Load credentials from environment.
 */
export function loadCredentialsFromEnv(env: NodeJS.ProcessEnv = process.env): ApiCredentials | null {
    const apiKey = env.CODEFORCES_API_KEY?.trim();
    const apiSecret = env.CODEFORCES_API_SECRET?.trim();

    if (!apiKey || !apiSecret) {
        return null;
    }

    return { apiKey, apiSecret };
}

/**
 * Validate credentials format (not whether the service accepts them).
 */
export function validateCredentials(creds: ApiCredentials): CredentialValidationResult {
    const errors: string[] = [];

    if (!creds.apiKey) {
        errors.push("API key is missing");
    } else if (/[\s&=#?]/.test(creds.apiKey)) {
        errors.push("API key contains whitespace or URL delimiters");
    }

    if (!creds.apiSecret) {
        errors.push("API secret is missing");
    }

    // Check for placeholder values
    const placeholders = ["your_api_key", "your_secret", "<api_key>", "<api_secret>", "placeholder"];
    for (const ph of placeholders) {
        if (creds.apiKey.toLowerCase().includes(ph) ||
            creds.apiSecret.toLowerCase().includes(ph)) {
            errors.push("Credentials contain placeholder values");
            break;
        }
    }

    return {
        valid: errors.length === 0,
        errors
    };
}

/**
 * Mask an API key for logging (shows only first/last 4 chars).
 */
export function maskApiKey(apiKey: string): string {
    return apiKey.length > 8
        ? `${apiKey.slice(0, 4)}...${apiKey.slice(-4)}`
        : "****";
}

/**
 * Loggable view of credentials. The secret is never part of it.
 */
export function maskCredentials(creds: ApiCredentials): { apiKey: string } {
    return { apiKey: maskApiKey(creds.apiKey) };
}
