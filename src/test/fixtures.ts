import {promises as fs} from 'fs';
import * as os from 'os';
import * as path from 'path';
import {Logger} from '../utils';

export async function makeTempDir(): Promise<string> {
    return fs.mkdtemp(path.join(os.tmpdir(), 'bulk-put-'));
}

export async function writeFixture(dir: string, name: string, content: string | Buffer): Promise<string> {
    const filePath = path.join(dir, name);
    await fs.writeFile(filePath, content);
    return filePath;
}

export async function removeDir(dir: string): Promise<void> {
    await fs.rm(dir, {recursive: true, force: true});
}

/**
 * Route logger output into an array instead of stderr
 */
export function captureLogs(): string[] {
    const lines: string[] = [];
    const logger = Logger.getInstance();
    logger.setShowDetailedLogs(false);
    logger.updateConfig({write: line => lines.push(line)});
    return lines;
}

export function textResponse(status: number, body = ''): Response {
    return new Response(body, {status});
}

export function requestUrl(input: string | URL | Request): string {
    if (typeof input === 'string') return input;
    return input instanceof URL ? input.href : input.url;
}

/**
 * Drain a request body, streamed or not, as text
 */
export function requestBody(init?: RequestInit): Promise<string> {
    return new Response(init?.body ?? null).text();
}

/**
 * A fetch result that only settles when the request is aborted
 */
export function pendingUntilAborted(init?: RequestInit): Promise<Response> {
    return new Promise<Response>((_, reject) => {
        const signal = init?.signal;
        if (!signal) return;
        signal.addEventListener('abort', () => reject(signal.reason), {once: true});
    });
}
