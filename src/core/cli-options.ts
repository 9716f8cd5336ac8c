import {parseArgs} from 'util';
import {createUploadSettings, DEFAULT_UPLOAD_SETTINGS, ENV_ENDPOINT, ENV_TOKEN} from '../config';
import {SettingsError, UploadSettings} from '../types';
import {buildPrefix} from '../utils';

export const USAGE = `Usage: bulk-upload [options] <remote-path> <files...>

Options:
  -e, --endpoint <url>   file service endpoint (env ${ENV_ENDPOINT})
  -t, --token <token>    auth token (env ${ENV_TOKEN})
  -c, --cons <n>         concurrent uploads (default ${DEFAULT_UPLOAD_SETTINGS.concurrency})
  -r, --retries <n>      retries per file (default ${DEFAULT_UPLOAD_SETTINGS.maxRetries})
  -f, --force            overwrite existing remote files
      --timeout <ms>     per-attempt timeout, 0 disables (default ${DEFAULT_UPLOAD_SETTINGS.uploadTimeout})
  -v, --verbose          detailed logs on stderr
  -h, --help             show this help
`;

export type CliCommand =
    | {kind: 'help'}
    | {kind: 'run'; settings: Readonly<UploadSettings>; files: string[]; verbose: boolean};

export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}

/**
 * Resolve the command line into batch settings.
 * Flags win over environment variables, which win over defaults.
 */
export function parseCliArgs(argv: string[], env: NodeJS.ProcessEnv): CliCommand {
    let parsed: ReturnType<typeof parse>;
    try {
        parsed = parse(argv);
    } catch (error) {
        throw new UsageError(error instanceof Error ? error.message : String(error));
    }
    const {values, positionals} = parsed;

    if (values.help) {
        return {kind: 'help'};
    }

    const [remotePath, ...files] = positionals;
    if (remotePath === undefined) {
        throw new UsageError('Missing remote path');
    }
    if (files.length === 0) {
        throw new UsageError('No files to upload');
    }

    const endpoint = values.endpoint ?? env[ENV_ENDPOINT];
    if (!endpoint) {
        throw new UsageError(`Missing endpoint: pass --endpoint or set ${ENV_ENDPOINT}`);
    }
    const token = values.token ?? env[ENV_TOKEN];
    if (!token) {
        throw new UsageError(`Missing token: pass --token or set ${ENV_TOKEN}`);
    }

    try {
        const settings = createUploadSettings({
            prefix: buildPrefix(endpoint, remotePath),
            token,
            concurrency: parseCount(values.cons, '--cons'),
            maxRetries: parseCount(values.retries, '--retries'),
            overwrite: values.force,
            uploadTimeout: parseCount(values.timeout, '--timeout')
        });
        return {kind: 'run', settings, files, verbose: values.verbose ?? false};
    } catch (error) {
        if (error instanceof SettingsError) {
            throw new UsageError(error.message);
        }
        throw error;
    }
}

function parse(argv: string[]) {
    return parseArgs({
        args: argv,
        allowPositionals: true,
        strict: true,
        options: {
            endpoint: {type: 'string', short: 'e'},
            token: {type: 'string', short: 't'},
            cons: {type: 'string', short: 'c'},
            retries: {type: 'string', short: 'r'},
            force: {type: 'boolean', short: 'f'},
            timeout: {type: 'string'},
            verbose: {type: 'boolean', short: 'v'},
            help: {type: 'boolean', short: 'h'}
        }
    });
}

function parseCount(value: string | undefined, flag: string): number | undefined {
    if (value === undefined) {
        return undefined;
    }
    if (!/^\d+$/.test(value)) {
        throw new UsageError(`${flag} expects a non-negative integer, got "${value}"`);
    }
    return Number(value);
}
