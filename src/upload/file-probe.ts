import {promises as fs} from 'fs';
import type {FileHandle} from 'fs/promises';
import * as path from 'path';
import {ReadableStream} from 'stream/web';
import {Logger} from '../utils';

/**
 * An opened local file ready for upload.
 */
export interface ProbedFile {
    handle: FileHandle;
    fileName: string;
    size: number;
}

const logger = Logger.getInstance().createCategoryLogger('probe');

/**
 * Open a file for reading and check that it is a regular file.
 *
 * Returns null when the path cannot be opened, is not a regular file, or
 * has no base name. On success the caller owns the open handle.
 */
export async function probeFile(filePath: string): Promise<ProbedFile | null> {
    const fileName = path.basename(filePath);
    if (!fileName) {
        logger.debug(`No file name in path: ${filePath}`);
        return null;
    }

    let handle: FileHandle;
    try {
        handle = await fs.open(filePath, 'r');
    } catch (error) {
        logger.debug(`Cannot open ${filePath}`, error);
        return null;
    }

    try {
        const stat = await handle.stat();
        if (stat.isFile()) {
            return {handle, fileName, size: stat.size};
        }
        logger.debug(`Not a regular file: ${filePath}`);
    } catch (error) {
        logger.debug(`Cannot stat ${filePath}`, error);
    }

    await closeQuietly(handle, filePath);
    return null;
}

const CHUNK_SIZE = 64 * 1024;

/**
 * A request body read from an open file
 */
export interface BodyStream {
    stream: ReadableStream<Uint8Array>;
    /** The error that ended the stream early, null while reads succeed */
    readError: () => unknown;
}

/**
 * Stream the file from offset 0 as a request body.
 *
 * The first chunk is read before returning, so an unreadable handle fails
 * here rather than mid-request. Positional reads leave the handle's own
 * position alone, so every attempt starts from the beginning; the stream
 * never closes the handle.
 */
export async function openBodyStream(file: ProbedFile): Promise<BodyStream> {
    let offset = 0;
    let readError: unknown = null;
    const readChunk = async (): Promise<Uint8Array | null> => {
        const length = Math.min(CHUNK_SIZE, file.size - offset);
        if (length <= 0) {
            return null;
        }
        const {bytesRead, buffer} = await file.handle.read(Buffer.alloc(length), 0, length, offset);
        if (bytesRead === 0) {
            return null;
        }
        offset += bytesRead;
        return buffer.subarray(0, bytesRead);
    };

    let pending = await readChunk();

    const stream = new ReadableStream<Uint8Array>({
        async pull(controller) {
            let chunk = pending;
            pending = null;
            if (!chunk) {
                try {
                    chunk = await readChunk();
                } catch (error) {
                    readError = error;
                    controller.error(error);
                    return;
                }
            }
            if (chunk) {
                controller.enqueue(chunk);
            } else {
                controller.close();
            }
        }
    });

    return {stream, readError: () => readError};
}

export async function closeQuietly(handle: FileHandle, filePath: string): Promise<void> {
    try {
        await handle.close();
    } catch (error) {
        logger.warn(`Failed to close ${filePath}`, error);
    }
}
