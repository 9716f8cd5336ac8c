import {ErrorKind, FailedUpload, SuccessfulUpload} from '../types';

/**
 * Per-file state carried through the upload state machine.
 *
 * Each transition returns a new record, so a retry count can never leak
 * from one attempt into a stale copy held elsewhere. `succeed` and `fail`
 * produce the finalized outcome handed to the progress aggregator.
 */
export class UploadRecord {
    private constructor(
        public readonly path: string,
        public readonly startedAt: number,
        public readonly bytes: number,
        public readonly retries: number
    ) {}

    static start(path: string, now: number): UploadRecord {
        return new UploadRecord(path, now, 0, 0);
    }

    withBytes(bytes: number): UploadRecord {
        return new UploadRecord(this.path, this.startedAt, bytes, this.retries);
    }

    withRetry(): UploadRecord {
        return new UploadRecord(this.path, this.startedAt, this.bytes, this.retries + 1);
    }

    /**
     * @param now same clock as `start`, in milliseconds
     */
    succeed(now: number): Readonly<SuccessfulUpload> {
        return Object.freeze({
            status: 'success',
            path: this.path,
            bytes: this.bytes,
            retries: this.retries,
            elapsed: Math.max(0, now - this.startedAt) / 1000
        });
    }

    fail(error: ErrorKind, message: string): Readonly<FailedUpload> {
        return Object.freeze({
            status: 'failed',
            path: this.path,
            bytes: this.bytes,
            retries: this.retries,
            error,
            message
        });
    }
}
