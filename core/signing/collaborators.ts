/**
 * Clock and nonce sources used by the signer. Both are injectable so a
 * fixed clock and a fixed nonce yield a fixed signature.
 */

import crypto from "node:crypto";

/** Current unix time in whole seconds */
export type Clock = () => number;

/** Fresh numeric nonce, one per signature */
export type NonceSource = () => string;

export const NONCE_LENGTH = 6;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

/**
 * Six random decimal digits from the CSPRNG. Each call draws independently,
 * so concurrent signers never share state.
 */
export const randomNonce: NonceSource = () =>
    crypto.randomInt(0, 10 ** NONCE_LENGTH).toString().padStart(NONCE_LENGTH, "0");

export function fixedClock(seconds: number): Clock {
    return () => seconds;
}

export function fixedNonce(nonce: string): NonceSource {
    return () => nonce;
}
