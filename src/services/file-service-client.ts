import type {ReadableStream} from 'stream/web';
import {AUTH_HEADER} from '../config';
import {UploadSettings} from '../types';
import {createTimeoutError} from '../utils';

export type FetchFn = typeof fetch;

export interface FileServiceClientOptions {
    /** Per-request timeout in milliseconds, 0 disables it */
    timeout?: number;
    fetch?: FetchFn;
}

/**
 * Abort controller that fires on a timeout or when the parent signal aborts
 */
interface RequestController {
    signal: AbortSignal;
    clear: () => void;
}

/**
 * The one network client of a batch.
 *
 * Carries the auth token as a default header and is shared read-only by
 * every concurrent upload.
 */
export class FileServiceClient {
    private readonly defaultHeaders: Readonly<Record<string, string>>;
    private readonly timeout: number;
    private readonly fetchFn: FetchFn;

    constructor(token: string, options: FileServiceClientOptions = {}) {
        this.defaultHeaders = Object.freeze({[AUTH_HEADER]: token});
        this.timeout = options.timeout ?? 0;
        this.fetchFn = options.fetch ?? globalThis.fetch.bind(globalThis);
    }

    static fromSettings(settings: Readonly<UploadSettings>, fetchFn?: FetchFn): FileServiceClient {
        return new FileServiceClient(settings.token, {timeout: settings.uploadTimeout, fetch: fetchFn});
    }

    /**
     * Stream the body to the url with a PUT. Resolves with the response for
     * any status; rejects on transport failure, timeout, or abort.
     */
    public async put(
        url: string,
        body: ReadableStream<Uint8Array>,
        contentLength: number,
        signal?: AbortSignal
    ): Promise<Response> {
        const controller = this.createRequestController(signal);
        try {
            return await this.fetchFn(url, {
                method: 'PUT',
                headers: {
                    ...this.defaultHeaders,
                    'Content-Type': 'application/octet-stream',
                    'Content-Length': String(contentLength)
                },
                body,
                duplex: 'half',
                signal: controller.signal
            });
        } finally {
            controller.clear();
        }
    }

    private createRequestController(parent?: AbortSignal): RequestController {
        const controller = new AbortController();
        const timeoutId = this.timeout
            ? setTimeout(() => controller.abort(createTimeoutError('Upload timed out')), this.timeout)
            : null;

        const onParentAbort = () => controller.abort(parent?.reason);
        if (parent?.aborted) {
            controller.abort(parent.reason);
        } else {
            parent?.addEventListener('abort', onParentAbort, {once: true});
        }

        return {
            signal: controller.signal,
            clear: () => {
                if (timeoutId) clearTimeout(timeoutId);
                parent?.removeEventListener('abort', onParentAbort);
            }
        };
    }
}
