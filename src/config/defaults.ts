import {SettingsError, UploadSettings, UploadSettingsInput} from '../types';

/**
 * Defaults for everything but the destination and the token
 */
export const DEFAULT_UPLOAD_SETTINGS: Omit<UploadSettings, 'prefix' | 'token'> = {
    concurrency: 10,
    maxRetries: 3,
    overwrite: false,
    uploadTimeout: 0
};

/**
 * Merge the input over the defaults, validate, and freeze the result.
 */
export function createUploadSettings(input: UploadSettingsInput): Readonly<UploadSettings> {
    const settings: UploadSettings = {
        prefix: input.prefix,
        token: input.token,
        concurrency: input.concurrency ?? DEFAULT_UPLOAD_SETTINGS.concurrency,
        maxRetries: input.maxRetries ?? DEFAULT_UPLOAD_SETTINGS.maxRetries,
        overwrite: input.overwrite ?? DEFAULT_UPLOAD_SETTINGS.overwrite,
        uploadTimeout: input.uploadTimeout ?? DEFAULT_UPLOAD_SETTINGS.uploadTimeout
    };

    if (!settings.prefix.trim()) {
        throw new SettingsError('prefix', 'Destination prefix is required');
    }
    if (!settings.token) {
        throw new SettingsError('token', 'Auth token is required');
    }
    if (!Number.isSafeInteger(settings.concurrency) || settings.concurrency < 1) {
        throw new SettingsError('concurrency', `Concurrency must be a positive integer, got ${settings.concurrency}`);
    }
    if (!Number.isSafeInteger(settings.maxRetries) || settings.maxRetries < 0) {
        throw new SettingsError('maxRetries', `Retries must be a non-negative integer, got ${settings.maxRetries}`);
    }
    if (!Number.isFinite(settings.uploadTimeout) || settings.uploadTimeout < 0) {
        throw new SettingsError('uploadTimeout', `Timeout must be a non-negative number, got ${settings.uploadTimeout}`);
    }

    return Object.freeze(settings);
}
