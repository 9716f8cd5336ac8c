/**
 * Settings for one upload batch. Shared read-only by every upload of the batch.
 */
export interface UploadSettings {
    prefix: string;
    token: string;
    concurrency: number;
    maxRetries: number;
    overwrite: boolean;
    uploadTimeout: number;
}

export type UploadSettingsInput = Pick<UploadSettings, 'prefix' | 'token'> & Partial<UploadSettings>;

/**
 * Thrown when settings fail validation.
 */
export class SettingsError extends Error {
    public readonly field: keyof UploadSettings;

    constructor(field: keyof UploadSettings, message: string) {
        super(message);
        this.name = 'SettingsError';
        this.field = field;
    }
}
