import {FILE_EXISTS_MARKER} from '../config';
import {FileServiceClient} from '../services';
import {AttemptResult, UploadError} from '../types';
import {errorMessage, getErrorCode, isAbortError, isCommonNetworkError, Logger} from '../utils';
import {BodyStream, openBodyStream, ProbedFile} from './file-probe';

const logger = Logger.getInstance().createCategoryLogger('attempt');

/**
 * One streamed PUT of the full file contents, classified.
 *
 * Only 200, 401 and a 500 carrying the "already exists" text are final;
 * everything else, transport failures included, is retryable.
 */
export async function attemptUpload(
    client: FileServiceClient,
    file: ProbedFile,
    url: string,
    signal?: AbortSignal
): Promise<AttemptResult> {
    let body: BodyStream;
    try {
        body = await openBodyStream(file);
    } catch (error) {
        return {kind: 'retryable', error: readFailure(file, error)};
    }

    let response: Response;
    try {
        response = await client.put(url, body.stream, file.size, signal);
    } catch (error) {
        const readError = body.readError();
        return {
            kind: 'retryable',
            error: readError === null ? classifyTransportError(error) : readFailure(file, readError)
        };
    }

    return classifyResponse(response);
}

export async function classifyResponse(response: Response): Promise<AttemptResult> {
    switch (response.status) {
        case 200:
            await discardBody(response);
            return {kind: 'success', status: 200};
        case 401:
            await discardBody(response);
            return {kind: 'rejected', error: 'unauthorized', status: 401};
        case 500: {
            let text: string;
            try {
                text = await response.text();
            } catch (error) {
                return {
                    kind: 'retryable',
                    error: {type: 'server', message: `HTTP 500, unreadable body: ${errorMessage(error)}`, code: 500}
                };
            }
            if (text.includes(FILE_EXISTS_MARKER)) {
                return {kind: 'rejected', error: 'file_exists', status: 500};
            }
            return {kind: 'retryable', error: {type: 'server', message: `HTTP 500: ${text.substring(0, 200)}`, code: 500}};
        }
        default:
            await discardBody(response);
            return {
                kind: 'retryable',
                error: {
                    type: response.status >= 500 ? 'server' : 'unknown',
                    message: `HTTP ${response.status} ${response.statusText}`.trim(),
                    code: response.status
                }
            };
    }
}

export function classifyTransportError(error: unknown): UploadError {
    const message = errorMessage(error);
    const code = getErrorCode(error);
    if (isAbortError(error)) {
        return {type: 'timeout', message, code: code ?? 'TIMEOUT'};
    }
    if (isCommonNetworkError(error) || message.includes('fetch failed')) {
        return {type: 'network', message, code};
    }
    return {type: 'unknown', message, code};
}

function readFailure(file: ProbedFile, error: unknown): UploadError {
    return {type: 'local', message: `Cannot read ${file.fileName}: ${errorMessage(error)}`, code: getErrorCode(error)};
}

/**
 * Release the connection held by an unread body
 */
async function discardBody(response: Response): Promise<void> {
    try {
        await response.arrayBuffer();
    } catch (error) {
        logger.debug(`Response body discarded with error: ${errorMessage(error)}`);
    }
}
