/**
 * Common Node network error codes
 */
const NETWORK_ERROR_CODES = new Set([
    'ECONNRESET',      // Connection reset by peer
    'ENOTFOUND',       // DNS lookup failed
    'EAI_AGAIN',       // DNS lookup timed out
    'ETIMEDOUT',       // Connection timed out
    'ECONNREFUSED',    // Connection refused
    'EHOSTUNREACH',    // Host unreachable
    'ENETUNREACH',     // Network unreachable
    'EPIPE',           // Broken pipe
    'ECONNABORTED',    // Connection aborted
    'UND_ERR_SOCKET',
    'UND_ERR_CONNECT_TIMEOUT'
]);

function readCode(value: unknown): string | undefined {
    if (typeof value !== 'object' || value === null || !('code' in value)) {
        return undefined;
    }
    return typeof value.code === 'string' ? value.code : undefined;
}

/**
 * Error code of the error itself or, for fetch failures, of its cause.
 */
export function getErrorCode(error: unknown): string | undefined {
    const own = readCode(error);
    if (own) return own;
    if (error instanceof Error) {
        return readCode(error.cause);
    }
    return undefined;
}

export function isCommonNetworkError(error: unknown): boolean {
    const code = getErrorCode(error);
    return code ? NETWORK_ERROR_CODES.has(code) : false;
}

export function isAbortError(error: unknown): boolean {
    return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export function createTimeoutError(message: string): Error {
    const error = new Error(message);
    error.name = 'TimeoutError';
    return error;
}
