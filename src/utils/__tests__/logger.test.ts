import {afterEach, describe, expect, it} from 'vitest';
import {Logger} from '../logger';

describe('Logger', () => {
    const logger = Logger.getInstance();

    afterEach(() => {
        logger.setShowDetailedLogs(false);
    });

    it('drops debug and info lines unless detailed logs are on', () => {
        const lines: string[] = [];
        logger.updateConfig({write: line => lines.push(line)});

        logger.info('quiet');
        logger.setShowDetailedLogs(true);
        logger.info('loud');

        expect(lines).toHaveLength(1);
        expect(lines[0]).toMatch(/^\[\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}\] \[INFO\] \[bulk-put\] loud\n$/);
    });

    it('tags category lines and formats extra arguments', () => {
        const lines: string[] = [];
        logger.updateConfig({write: line => lines.push(line)});

        logger.createCategoryLogger('batch').warn('slow upload', 42);

        expect(lines[0].endsWith('[WARN] [bulk-put] [batch] slow upload 42\n')).toBe(true);
    });

    it('writes the message of an error', () => {
        const lines: string[] = [];
        logger.updateConfig({write: line => lines.push(line)});

        logger.error('Upload failed', new Error('socket hang up'));

        expect(lines).toHaveLength(1);
        expect(lines[0].endsWith('[ERROR] [bulk-put] Upload failed: socket hang up\n')).toBe(true);
    });

    it('writes notices regardless of level', () => {
        const lines: string[] = [];
        logger.updateConfig({write: line => lines.push(line)});

        logger.notify('2 uploads interrupted');
        logger.notifyError('Unauthorized: check your token.');

        expect(lines).toEqual([
            'bulk-put: 2 uploads interrupted\n',
            'bulk-put: error: Unauthorized: check your token.\n'
        ]);
    });
});
