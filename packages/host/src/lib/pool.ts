/**
 * Bounded worker pool with per-key lanes
 *
 * Tasks on different lanes run concurrently up to the pool's limit; tasks on
 * the same lane run one after another in submission order.
 */

export class WorkerPool {
    private readonly lanes = new Map<string, Promise<void>>();
    private readonly waiting: Array<() => void> = [];
    private active = 0;

    constructor(private readonly concurrency: number) {
        if (!Number.isInteger(concurrency) || concurrency < 1) {
            throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
        }
    }

    run<T>(laneId: string, task: () => Promise<T>): Promise<T> {
        const previous = this.lanes.get(laneId) ?? Promise.resolve();
        const result = previous.then(() => this.withSlot(task));

        // The lane only tracks ordering; callers observe failures through `result`
        const lane = result.then(
            () => undefined,
            () => undefined
        );
        this.lanes.set(laneId, lane);
        void lane.then(() => {
            if (this.lanes.get(laneId) === lane) {
                this.lanes.delete(laneId);
            }
        });

        return result;
    }

    private async withSlot<T>(task: () => Promise<T>): Promise<T> {
        await this.acquire();
        try {
            return await task();
        } finally {
            this.release();
        }
    }

    private acquire(): Promise<void> {
        if (this.active < this.concurrency) {
            this.active += 1;
            return Promise.resolve();
        }
        return new Promise((resolve) => this.waiting.push(resolve));
    }

    private release(): void {
        const next = this.waiting.shift();
        if (next) {
            // Hand the slot straight to the next task
            next();
        } else {
            this.active -= 1;
        }
    }
}
