import {describe, expect, it} from 'vitest';
import {buildPrefix, buildUploadUrl, trimSlashes} from '../url.utils';

describe('url utils', () => {
    it('trims slashes on both ends', () => {
        expect(trimSlashes('//Storage/me/')).toBe('Storage/me');
    });

    it('joins endpoint and remote folder without doubled slashes', () => {
        expect(buildPrefix('https://files.test/api/file/', '/Storage/me//data/')).toBe(
            'https://files.test/api/file/Storage/me/data'
        );
    });

    it('uses the endpoint alone for an empty remote folder', () => {
        expect(buildPrefix('https://files.test/api/file', '/')).toBe('https://files.test/api/file');
    });

    it('encodes the file name and adds the quiet marker without overwrite', () => {
        expect(buildUploadUrl('https://files.test/data', 'r&d #1.csv', false)).toBe(
            'https://files.test/data/r%26d%20%231.csv?quiet=true'
        );
        expect(buildUploadUrl('https://files.test/data/', 'a.csv', true)).toBe('https://files.test/data/a.csv');
    });
});
