/**
 * Trailing debounce with an upper bound
 *
 * Each trigger restarts the quiet-period timer, but the callback fires no
 * later than `maxWaitMs` after the first trigger of a burst.
 */

export class Debouncer {
    private timer: ReturnType<typeof setTimeout> | null = null;
    private burstStartedAt: number | null = null;

    constructor(
        private readonly callback: () => void,
        private readonly waitMs: number,
        private readonly maxWaitMs: number
    ) {}

    get pending(): boolean {
        return this.timer !== null;
    }

    trigger(): void {
        const now = Date.now();
        if (this.burstStartedAt === null) {
            this.burstStartedAt = now;
        }
        if (this.timer) {
            clearTimeout(this.timer);
        }

        const untilMax = this.burstStartedAt + this.maxWaitMs - now;
        const delay = Math.max(0, Math.min(this.waitMs, untilMax));
        this.timer = setTimeout(() => this.fire(), delay);
    }

    /**
     * Drops a pending burst without firing
     */
    cancel(): void {
        if (this.timer) {
            clearTimeout(this.timer);
        }
        this.timer = null;
        this.burstStartedAt = null;
    }

    private fire(): void {
        this.timer = null;
        this.burstStartedAt = null;
        this.callback();
    }
}
