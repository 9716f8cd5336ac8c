import {UploadError, UploadSettings} from '../types';

/**
 * Retry strategy configuration
 */
export interface RetryConfig {
    maxRetries: number;
}

/**
 * Result of retry decision
 */
export interface RetryDecision {
    shouldRetry: boolean;
    reason: string;
}

/**
 * Retry strategy interface - allows for different retry policies
 */
export interface IRetryStrategy {
    /**
     * Decide whether to try again after a retryable failure
     *
     * @param retryCount retries consumed so far, including this failure
     */
    decide(error: UploadError, retryCount: number): RetryDecision;
}

/**
 * Bounded, immediate retry.
 *
 * The budget bounds the number of attempts, not wall-clock time: there is
 * no delay between attempts. Once `retryCount` reaches `maxRetries` the
 * file is given up, so a budget of 0 still allows the first attempt.
 */
export class BoundedRetryStrategy implements IRetryStrategy {
    private readonly config: RetryConfig;

    constructor(config: RetryConfig) {
        this.config = {...config};
    }

    static fromUploadSettings(settings: Pick<UploadSettings, 'maxRetries'>): BoundedRetryStrategy {
        return new BoundedRetryStrategy({maxRetries: settings.maxRetries});
    }

    public decide(error: UploadError, retryCount: number): RetryDecision {
        if (retryCount >= this.config.maxRetries) {
            return {
                shouldRetry: false,
                reason: `Max retries (${this.config.maxRetries}) exceeded, last error: ${error.message}`
            };
        }

        return {
            shouldRetry: true,
            reason: `Retry ${retryCount}/${this.config.maxRetries} after ${error.type} error: ${error.message}`
        };
    }
}
