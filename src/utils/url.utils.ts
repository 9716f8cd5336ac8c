import {QUIET_QUERY} from '../config';

/**
 * Strip leading and trailing slashes.
 */
export function trimSlashes(value: string): string {
    return value.replace(/^\/+|\/+$/g, '');
}

/**
 * Join a service endpoint and a remote folder into a destination prefix.
 */
export function buildPrefix(endpoint: string, remotePath: string): string {
    const folder = trimSlashes(remotePath.replace(/\\/g, '/').replace(/\/{2,}/g, '/'));
    const base = endpoint.trim().replace(/\/+$/, '');
    return folder ? `${base}/${folder}` : base;
}

/**
 * Destination of one file: `<prefix>/<name>`, plus the quiet marker when overwrite is off.
 */
export function buildUploadUrl(prefix: string, fileName: string, overwrite: boolean): string {
    const url = `${prefix.replace(/\/+$/, '')}/${encodeURIComponent(fileName)}`;
    return overwrite ? url : `${url}?${QUIET_QUERY}`;
}
