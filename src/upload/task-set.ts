import {v4 as uuidv4} from 'uuid';

export type JoinResult<T> =
    | {id: string; label: string; ok: true; value: T}
    | {id: string; label: string; ok: false; error: unknown};

interface RunningTask<T> {
    label: string;
    settled: Promise<JoinResult<T>>;
}

/**
 * A set of running tasks that can be awaited in completion order.
 *
 * `joinNext` resolves with whichever task settles first, not the oldest
 * one. A task that throws is joined as `ok: false` instead of rejecting.
 */
export class TaskSet<T> {
    private readonly running: Map<string, RunningTask<T>> = new Map();

    get size(): number {
        return this.running.size;
    }

    /**
     * Start `work` now and track it under `label`
     */
    spawn(label: string, work: () => Promise<T>): string {
        const id = uuidv4();
        const settled = Promise.resolve()
            .then(work)
            .then(
                (value): JoinResult<T> => ({id, label, ok: true, value}),
                (error: unknown): JoinResult<T> => ({id, label, ok: false, error})
            );
        this.running.set(id, {label, settled});
        return id;
    }

    /**
     * Wait for any task to settle and remove it. Undefined when empty.
     */
    async joinNext(): Promise<JoinResult<T> | undefined> {
        if (this.running.size === 0) {
            return undefined;
        }
        const result = await Promise.race(Array.from(this.running.values(), task => task.settled));
        this.running.delete(result.id);
        return result;
    }

    labels(): string[] {
        return Array.from(this.running.values(), task => task.label);
    }
}
