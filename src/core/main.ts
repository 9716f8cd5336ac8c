import {FetchFn} from '../services';
import {BatchReport} from '../types';
import {UploadManager} from '../upload';
import {Logger} from '../utils';
import {parseCliArgs, USAGE, UsageError} from './cli-options';
import {StatusLine} from './status-line';

export interface MainIO {
    stdout: (chunk: string) => void;
    stderr: (chunk: string) => void;
    fetch?: FetchFn;
}

const defaultIO: MainIO = {
    stdout: chunk => {
        process.stdout.write(chunk);
    },
    stderr: chunk => {
        process.stderr.write(chunk);
    }
};

export const EXIT_OK = 0;
export const EXIT_FAILURES = 1;
export const EXIT_FATAL = 2;

/**
 * Command line entry: parse, run the batch, map the report to an exit code.
 */
export async function main(argv: string[], env: NodeJS.ProcessEnv, io: MainIO = defaultIO): Promise<number> {
    const logger = Logger.getInstance();
    logger.updateConfig({write: io.stderr});

    let command: ReturnType<typeof parseCliArgs>;
    try {
        command = parseCliArgs(argv, env);
    } catch (error) {
        if (error instanceof UsageError) {
            logger.notifyError(error.message);
            io.stderr(USAGE);
            return EXIT_FATAL;
        }
        throw error;
    }

    if (command.kind === 'help') {
        io.stdout(USAGE);
        return EXIT_OK;
    }

    logger.setShowDetailedLogs(command.verbose);

    const status = new StatusLine(io.stdout);
    const manager = new UploadManager(command.settings, {fetch: io.fetch});
    manager.on(UploadManager.EVENTS.STATS_UPDATED, (line: string) => status.update(line));
    manager.on(UploadManager.EVENTS.TASK_CRASHED, () => status.end());
    manager.on(UploadManager.EVENTS.BATCH_UNAUTHORIZED, () => status.end());

    const report = await manager.uploadMany(command.files);
    status.end();

    return exitCode(report, logger);
}

function exitCode(report: BatchReport, logger: Logger): number {
    if (report.unauthorized) {
        if (report.interrupted.length > 0) {
            logger.notify(`${report.interrupted.length} uploads interrupted`);
        }
        return EXIT_FATAL;
    }
    if (report.crashed.length > 0) {
        logger.notify(`${report.crashed.length} uploads ended without a result`);
    }
    return report.progress.error > 0 || report.crashed.length > 0 ? EXIT_FAILURES : EXIT_OK;
}
