import {UploadRecord} from '../models';
import {FileServiceClient} from '../services';
import {Clock, UploadOutcome, UploadSettings} from '../types';
import {buildUploadUrl, Logger} from '../utils';
import {closeQuietly, probeFile} from './file-probe';
import {IRetryStrategy} from './retry-strategy';
import {attemptUpload} from './upload-attempt';

/**
 * TaskRunner - uploads a single file to completion.
 *
 * Probing → Uploading → Success | Failed(kind), looping on Uploading for
 * retryable attempts. Holds no state across files; one runner is shared by
 * every concurrent slot of a batch.
 *
 * Does NOT handle:
 * - Concurrency or launching (UploadManager)
 * - Progress totals (UploadProgress)
 */
export class TaskRunner {
    private readonly logger = Logger.getInstance().createCategoryLogger('upload');

    constructor(
        private readonly client: FileServiceClient,
        private readonly settings: Readonly<UploadSettings>,
        private readonly retryStrategy: IRetryStrategy,
        private readonly clock: Clock = () => performance.now()
    ) {}

    /**
     * Upload one file. Never rejects: every failure is an outcome.
     *
     * @param signal aborted when the batch halts; the loop stops without counting a retry
     */
    public async execute(filePath: string, signal?: AbortSignal): Promise<UploadOutcome> {
        let record = UploadRecord.start(filePath, this.clock());

        const file = await probeFile(filePath);
        if (!file) {
            this.logger.debug(`Cannot read ${filePath}`);
            return record.fail('read_error', `Cannot read ${filePath}`);
        }
        record = record.withBytes(file.size);

        const url = buildUploadUrl(this.settings.prefix, file.fileName, this.settings.overwrite);

        try {
            for (;;) {
                if (signal?.aborted) {
                    return record.fail('other', 'Upload interrupted');
                }

                const result = await attemptUpload(this.client, file, url, signal);

                if (result.kind === 'success') {
                    this.logger.info(`Uploaded ${file.fileName} -> ${url}`);
                    return record.succeed(this.clock());
                }

                if (result.kind === 'rejected') {
                    const message = result.error === 'unauthorized'
                        ? `Unauthorized (HTTP ${result.status})`
                        : `Remote file already exists: ${file.fileName}`;
                    this.logger.debug(message);
                    return record.fail(result.error, message);
                }

                // an aborted request is not a retry
                if (signal?.aborted) {
                    return record.fail('other', 'Upload interrupted');
                }

                record = record.withRetry();
                const decision = this.retryStrategy.decide(result.error, record.retries);
                if (!decision.shouldRetry) {
                    this.logger.debug(`Giving up on ${file.fileName}: ${decision.reason}`);
                    return record.fail('other', decision.reason);
                }
                this.logger.debug(`${file.fileName}: ${decision.reason}`);
            }
        } finally {
            await closeQuietly(file.handle, filePath);
        }
    }
}
