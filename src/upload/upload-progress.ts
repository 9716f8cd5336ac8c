import {BYTES_PER_MB} from '../config';
import {Clock, ProgressSnapshot, UploadOutcome} from '../types';

/**
 * Running totals of a batch and its one-line status.
 *
 * Only the scheduler's draining loop calls `update`. `render` returns the
 * line; printing it is the caller's business.
 */
export class UploadProgress {
    private success = 0;
    private error = 0;
    private retriedFiles = 0;
    private retries = 0;
    private bytes = 0;
    private readonly startedAt: number;

    constructor(
        private readonly total: number,
        private readonly clock: Clock = () => performance.now()
    ) {
        this.startedAt = clock();
    }

    update(outcome: UploadOutcome): void {
        if (outcome.status === 'success') {
            this.success++;
            this.bytes += outcome.bytes;
        } else {
            this.error++;
        }
        if (outcome.retries > 0) {
            this.retriedFiles++;
            this.retries += outcome.retries;
        }
    }

    /** Seconds since the aggregator was created */
    elapsed(): number {
        return Math.max(0, this.clock() - this.startedAt) / 1000;
    }

    snapshot(): ProgressSnapshot {
        return {
            total: this.total,
            success: this.success,
            error: this.error,
            retriedFiles: this.retriedFiles,
            retries: this.retries,
            bytes: this.bytes,
            elapsed: this.elapsed()
        };
    }

    render(): string {
        return formatStatus(this.snapshot());
    }
}

export function formatStatus(progress: ProgressSnapshot): string {
    const megabytes = progress.bytes / BYTES_PER_MB;
    // keep the divisor off zero
    const throughput = megabytes / (progress.elapsed + 1e-6);

    return `Uploaded ${progress.success}/${progress.total} files, ${progress.error} errors `
        + `${progress.retriedFiles}|${progress.retries} retries ${megabytes.toFixed(2)} MB `
        + `in ${progress.elapsed.toFixed(2)} seconds (${throughput.toFixed(2)} MB/s)`;
}
