import {EventEmitter} from 'events';
import {UPLOAD_EVENTS} from '../config';
import {FetchFn, FileServiceClient} from '../services';
import {BatchReport, Clock, ProgressSnapshot, UploadOutcome, UploadSettings} from '../types';
import {Logger} from '../utils';
import {BoundedRetryStrategy, IRetryStrategy} from './retry-strategy';
import {TaskRunner} from './task-runner';
import {TaskSet} from './task-set';
import {formatStatus, UploadProgress} from './upload-progress';

export interface UploadManagerOptions {
    fetch?: FetchFn;
    clock?: Clock;
    retryStrategy?: IRetryStrategy;
}

/**
 * UploadManager - runs a batch of uploads through a sliding window.
 *
 * Responsibilities:
 * - Keeps `concurrency` uploads in flight, launching one replacement per completion
 * - Folds every outcome into the progress totals, in completion order
 * - Halts the batch on the first unauthorized outcome
 * - Event emission for the terminal (status line, notices)
 *
 * Events:
 * - `stats:updated` (status: string, snapshot: ProgressSnapshot)
 * - `task:started` (path: string)
 * - `task:completed` / `task:failed` (outcome: UploadOutcome)
 * - `task:crashed` (path: string, error: unknown)
 * - `batch:unauthorized` (outcome: UploadOutcome, interrupted: string[])
 * - `queue:empty` (report: BatchReport)
 */
export class UploadManager extends EventEmitter {
    static readonly EVENTS = UPLOAD_EVENTS;

    private readonly logger = Logger.getInstance().createCategoryLogger('batch');
    private readonly taskRunner: TaskRunner;
    private readonly clock: Clock;

    constructor(
        private readonly settings: Readonly<UploadSettings>,
        options: UploadManagerOptions = {}
    ) {
        super();
        this.clock = options.clock ?? (() => performance.now());

        const client = FileServiceClient.fromSettings(settings, options.fetch);
        const retryStrategy = options.retryStrategy ?? BoundedRetryStrategy.fromUploadSettings(settings);
        this.taskRunner = new TaskRunner(client, settings, retryStrategy, this.clock);
    }

    /**
     * Upload every path and resolve once all outcomes are accounted for,
     * or right after an unauthorized outcome halts the batch.
     *
     * On a halt, in-flight uploads are aborted and not awaited; their paths
     * and the never-launched ones are reported as `interrupted`.
     */
    async uploadMany(filePaths: readonly string[]): Promise<BatchReport> {
        const progress = new UploadProgress(filePaths.length, this.clock);
        const batch = new AbortController();
        const tasks = new TaskSet<UploadOutcome>();
        const outcomes: UploadOutcome[] = [];
        const crashed: string[] = [];
        let next = 0;

        const launchNext = (): void => {
            if (next >= filePaths.length) {
                return;
            }
            const filePath = filePaths[next++];
            tasks.spawn(filePath, () => this.taskRunner.execute(filePath, batch.signal));
            this.emit(UploadManager.EVENTS.TASK_STARTED, filePath);
        };

        this.logger.info(`Uploading ${filePaths.length} files to ${this.settings.prefix} (concurrency ${this.settings.concurrency})`);
        let status = this.emitStats(progress.snapshot());

        const initial = Math.min(this.settings.concurrency, filePaths.length);
        for (let slot = 0; slot < initial; slot++) {
            launchNext();
        }

        for (let joined = await tasks.joinNext(); joined; joined = await tasks.joinNext()) {
            if (!joined.ok) {
                crashed.push(joined.label);
                this.emit(UploadManager.EVENTS.TASK_CRASHED, joined.label, joined.error);
                this.logger.error(`Worker task failed for ${joined.label}`, joined.error);
            } else {
                const outcome = joined.value;

                // The same token fails for every remaining upload
                if (outcome.status === 'failed' && outcome.error === 'unauthorized') {
                    batch.abort();
                    const interrupted = [...tasks.labels(), ...filePaths.slice(next)];
                    this.emit(UploadManager.EVENTS.BATCH_UNAUTHORIZED, outcome, interrupted);
                    Logger.getInstance().notifyError('Unauthorized: check your token.');
                    return {
                        outcomes,
                        progress: progress.snapshot(),
                        status,
                        unauthorized: true,
                        interrupted,
                        crashed
                    };
                }

                outcomes.push(outcome);
                progress.update(outcome);
                this.emit(
                    outcome.status === 'success' ? UploadManager.EVENTS.TASK_COMPLETED : UploadManager.EVENTS.TASK_FAILED,
                    outcome
                );
                status = this.emitStats(progress.snapshot());
            }

            launchNext();
        }

        const report: BatchReport = {
            outcomes,
            progress: progress.snapshot(),
            status,
            unauthorized: false,
            interrupted: [],
            crashed
        };
        this.logger.info(status);
        this.emit(UploadManager.EVENTS.QUEUE_EMPTY, report);
        return report;
    }

    private emitStats(snapshot: ProgressSnapshot): string {
        const status = formatStatus(snapshot);
        this.emit(UploadManager.EVENTS.STATS_UPDATED, status, snapshot);
        return status;
    }
}

/**
 * Upload a batch with a fresh manager
 */
export function uploadMany(
    filePaths: readonly string[],
    settings: Readonly<UploadSettings>,
    options?: UploadManagerOptions
): Promise<BatchReport> {
    return new UploadManager(settings, options).uploadMany(filePaths);
}
