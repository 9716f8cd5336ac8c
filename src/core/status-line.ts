/**
 * A terminal line that is redrawn in place.
 */
export class StatusLine {
    private open = false;

    constructor(private readonly write: (chunk: string) => void) {}

    update(line: string): void {
        this.write(`\r${line}`);
        this.open = true;
    }

    /**
     * Move past the current line so the next output starts on a fresh one
     */
    end(): void {
        if (this.open) {
            this.write('\n');
            this.open = false;
        }
    }
}
