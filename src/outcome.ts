import type { Outcome, Rejection, RejectionKind, Timestamp } from './types';

export function ok<T>(data: T): Outcome<T> {
    return { data, error: null };
}

export function reject<T>(kind: RejectionKind, message: string, retryAt?: Timestamp): Outcome<T> {
    return { data: null, error: retryAt === undefined ? { kind, message } : { kind, message, retryAt } };
}

/** Re-types a rejection for a different success payload. */
export function fail<T>(error: Rejection): Outcome<T> {
    return { data: null, error };
}
