import { performance } from 'perf_hooks';

export type Clock = () => number;
export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Enforces a minimum spacing between dispatches across every caller sharing the gate.
 *
 * Each caller reserves the next free slot synchronously before suspending, so concurrent
 * callers queue up one interval apart instead of all waking at the same instant.
 */
export class RateGate {
    private nextSlot = Number.NEGATIVE_INFINITY;

    constructor(
        private readonly intervalMs: number,
        private readonly clock: Clock = () => performance.now(),
        private readonly sleep: Sleep = defaultSleep,
    ) { }

    /**
     * Resolves once the caller may dispatch. Returns the monotonic time of its slot.
     */
    async acquire(): Promise<number> {
        const slot = Math.max(this.clock(), this.nextSlot);
        this.nextSlot = slot + this.intervalMs;

        // setTimeout may fire a little early relative to the monotonic clock
        let remaining = slot - this.clock();
        while (remaining > 0) {
            await this.sleep(Math.ceil(remaining));
            remaining = slot - this.clock();
        }
        return slot;
    }
}
