import { RateGate } from './rate-gate';

describe('RateGate', () => {
    let now: number;
    let sleeps: number[];
    let gate: RateGate;

    beforeEach(() => {
        now = 1_000;
        sleeps = [];
        gate = new RateGate(
            100,
            () => now,
            async (ms) => {
                sleeps.push(ms);
                now += ms;
            },
        );
    });

    it('should let the first caller through immediately', async () => {
        const slot = await gate.acquire();

        expect(slot).toBe(1_000);
        expect(sleeps).toEqual([]);
    });

    it('should space back-to-back callers by the interval', async () => {
        const slots: number[] = [];
        for (let i = 0; i < 5; i++) {
            slots.push(await gate.acquire());
        }

        expect(slots).toEqual([1_000, 1_100, 1_200, 1_300, 1_400]);
        expect(slots[4] - slots[0]).toBeGreaterThanOrEqual(4 * 100);
    });

    it('should hand concurrent callers distinct slots', async () => {
        const slots = await Promise.all([gate.acquire(), gate.acquire(), gate.acquire()]);

        expect(slots).toEqual([1_000, 1_100, 1_200]);
    });

    it('should not wait when the interval already elapsed', async () => {
        await gate.acquire();
        now += 250;

        const slot = await gate.acquire();

        expect(slot).toBe(1_250);
        expect(sleeps).toEqual([]);
    });

    it('should wait only for the remainder of the interval', async () => {
        await gate.acquire();
        now += 30;

        await gate.acquire();

        expect(sleeps).toEqual([70]);
    });

    it('should sleep again when a timer fires early', async () => {
        const early = new RateGate(
            100,
            () => now,
            async (ms) => {
                sleeps.push(ms);
                now += ms > 1 ? ms - 1 : ms;
            },
        );
        await early.acquire();

        await early.acquire();

        expect(sleeps).toEqual([100, 1]);
        expect(now).toBe(1_100);
    });

    it('should hold real callers apart on the monotonic clock', async () => {
        const realGate = new RateGate(20);
        const started = performance.now();

        await Promise.all([1, 2, 3, 4, 5].map(() => realGate.acquire()));

        expect(performance.now() - started).toBeGreaterThanOrEqual(80);
    });
});
