/**
 * Upload task related types.
 */

/**
 * Terminal failure classes of a single file.
 */
export type ErrorKind = 'read_error' | 'file_exists' | 'unauthorized' | 'other';

/**
 * Diagnostic detail of a retryable attempt failure.
 */
export interface UploadError {
    type: 'network' | 'server' | 'timeout' | 'local' | 'unknown';
    message: string;
    code?: string | number;
}

interface OutcomeBase {
    path: string;
    bytes: number;
    retries: number;
}

export interface SuccessfulUpload extends OutcomeBase {
    status: 'success';
    elapsed: number;
}

export interface FailedUpload extends OutcomeBase {
    status: 'failed';
    error: ErrorKind;
    message: string;
}

export type UploadOutcome = Readonly<SuccessfulUpload> | Readonly<FailedUpload>;

export type AttemptResult =
    | {kind: 'success'; status: number}
    | {kind: 'rejected'; error: 'unauthorized' | 'file_exists'; status: number}
    | {kind: 'retryable'; error: UploadError};

export interface ProgressSnapshot {
    total: number;
    success: number;
    error: number;
    retriedFiles: number;
    retries: number;
    bytes: number;
    elapsed: number;
}

export interface BatchReport {
    outcomes: UploadOutcome[];
    progress: ProgressSnapshot;
    status: string;
    unauthorized: boolean;
    interrupted: string[];
    crashed: string[];
}

/** Milliseconds from an arbitrary, monotonic origin. */
export type Clock = () => number;
