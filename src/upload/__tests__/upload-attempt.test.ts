import {afterEach, beforeEach, describe, expect, it, vi} from 'vitest';
import {ReadableStream} from 'stream/web';
import {FetchFn, FileServiceClient} from '../../services';
import {createTimeoutError} from '../../utils';
import {captureLogs, makeTempDir, removeDir, requestBody, requestUrl, textResponse, writeFixture} from '../../test/fixtures';
import {probeFile, ProbedFile} from '../file-probe';
import {attemptUpload, classifyResponse, classifyTransportError} from '../upload-attempt';

describe('classifyResponse', () => {
    it('treats 200 as success', async () => {
        await expect(classifyResponse(textResponse(200, 'ok'))).resolves.toEqual({kind: 'success', status: 200});
    });

    it('treats 401 as a final unauthorized rejection', async () => {
        await expect(classifyResponse(textResponse(401))).resolves.toEqual({
            kind: 'rejected',
            error: 'unauthorized',
            status: 401
        });
    });

    it('treats a 500 saying the file exists as a final rejection', async () => {
        const response = textResponse(500, '{"error": "File already exists: data/a.txt"}');

        await expect(classifyResponse(response)).resolves.toEqual({
            kind: 'rejected',
            error: 'file_exists',
            status: 500
        });
    });

    it('retries any other 500', async () => {
        await expect(classifyResponse(textResponse(500, 'disk full'))).resolves.toEqual({
            kind: 'retryable',
            error: {type: 'server', message: 'HTTP 500: disk full', code: 500}
        });
    });

    it('retries other statuses', async () => {
        const result = await classifyResponse(textResponse(404));

        expect(result).toMatchObject({kind: 'retryable', error: {type: 'unknown', code: 404}});
    });

    it('retries 503 as a server error', async () => {
        const result = await classifyResponse(textResponse(503));

        expect(result).toMatchObject({kind: 'retryable', error: {type: 'server', code: 503}});
    });
});

describe('classifyTransportError', () => {
    it('recognises network error codes on the cause', () => {
        const error = new TypeError('fetch failed', {cause: {code: 'ECONNREFUSED'}});

        expect(classifyTransportError(error)).toEqual({type: 'network', message: 'fetch failed', code: 'ECONNREFUSED'});
    });

    it('recognises timeouts', () => {
        const error = createTimeoutError('Upload timed out');

        expect(classifyTransportError(error)).toEqual({type: 'timeout', message: 'Upload timed out', code: 'TIMEOUT'});
    });

    it('falls back to unknown', () => {
        expect(classifyTransportError(new Error('boom'))).toEqual({type: 'unknown', message: 'boom', code: undefined});
    });
});

describe('attemptUpload', () => {
    let dir: string;
    let file: ProbedFile;

    beforeEach(async () => {
        captureLogs();
        dir = await makeTempDir();
        const probed = await probeFile(await writeFixture(dir, 'a.txt', 'payload'));
        if (!probed) throw new Error('probe failed');
        file = probed;
    });

    afterEach(async () => {
        await file.handle.close().catch(() => undefined);
        await removeDir(dir);
    });

    it('PUTs the file contents with the auth header', async () => {
        const fetchMock = vi.fn<FetchFn>(async () => textResponse(200));
        const client = new FileServiceClient('test-token', {fetch: fetchMock});

        const result = await attemptUpload(client, file, 'https://files.test/data/a.txt');

        expect(result).toEqual({kind: 'success', status: 200});
        expect(fetchMock).toHaveBeenCalledTimes(1);
        const [input, init] = fetchMock.mock.calls[0];
        expect(requestUrl(input)).toBe('https://files.test/data/a.txt');
        expect(init?.method).toBe('PUT');
        expect(new Headers(init?.headers).get('x-auth-token')).toBe('test-token');
        expect(await requestBody(init)).toBe('payload');
    });

    it('streams the body with its length', async () => {
        const fetchMock = vi.fn<FetchFn>(async () => textResponse(200));
        const client = new FileServiceClient('test-token', {fetch: fetchMock});

        await attemptUpload(client, file, 'https://files.test/data/a.txt');

        const init = fetchMock.mock.calls[0][1];
        expect(init?.body).toBeInstanceOf(ReadableStream);
        expect(init?.duplex).toBe('half');
        expect(new Headers(init?.headers).get('content-length')).toBe('7');
    });

    it('streams the full contents from the start again on a second attempt', async () => {
        const bodies: string[] = [];
        const fetchMock = vi.fn<FetchFn>(async (_input, init) => {
            bodies.push(await requestBody(init));
            return textResponse(503);
        });
        const client = new FileServiceClient('test-token', {fetch: fetchMock});

        await attemptUpload(client, file, 'https://files.test/data/a.txt');
        await attemptUpload(client, file, 'https://files.test/data/a.txt');

        expect(bodies).toEqual(['payload', 'payload']);
    });

    it('streams a file larger than one read chunk in order', async () => {
        const content = 'abcdefghij'.repeat(20000);
        const probed = await probeFile(await writeFixture(dir, 'large.txt', content));
        if (!probed) throw new Error('probe failed');
        const fetchMock = vi.fn<FetchFn>(async () => textResponse(200));
        const client = new FileServiceClient('test-token', {fetch: fetchMock});

        try {
            await attemptUpload(client, probed, 'https://files.test/data/large.txt');
            const body = await requestBody(fetchMock.mock.calls[0][1]);
            expect(body).toBe(content);
        } finally {
            await probed.handle.close();
        }
    });

    it('turns a transport failure into a retryable result', async () => {
        const fetchMock = vi.fn<FetchFn>(async () => {
            throw new TypeError('fetch failed', {cause: {code: 'ECONNRESET'}});
        });
        const client = new FileServiceClient('test-token', {fetch: fetchMock});

        await expect(attemptUpload(client, file, 'https://files.test/data/a.txt')).resolves.toEqual({
            kind: 'retryable',
            error: {type: 'network', message: 'fetch failed', code: 'ECONNRESET'}
        });
    });

    it('treats an unreadable file as retryable without sending', async () => {
        const fetchMock = vi.fn<FetchFn>(async () => textResponse(200));
        const client = new FileServiceClient('test-token', {fetch: fetchMock});
        await file.handle.close();

        const result = await attemptUpload(client, file, 'https://files.test/data/a.txt');

        expect(result).toMatchObject({kind: 'retryable', error: {type: 'local'}});
        expect(fetchMock).not.toHaveBeenCalled();
    });

    it('times out a request that takes too long', async () => {
        const fetchMock = vi.fn<FetchFn>((_input, init) => new Promise<Response>((_, reject) => {
            init?.signal?.addEventListener('abort', () => reject(init?.signal?.reason));
        }));
        const client = new FileServiceClient('test-token', {fetch: fetchMock, timeout: 5});

        const result = await attemptUpload(client, file, 'https://files.test/data/a.txt');

        expect(result).toMatchObject({kind: 'retryable', error: {type: 'timeout', message: 'Upload timed out'}});
    });
});
