import Bottleneck from "bottleneck";

const ONE_MINUTE_MS = 60_000;

export function createRateLimiter(concurrency: number, reservoir?: number): Bottleneck {
    const baseOptions = {
        maxConcurrent: Math.max(1, concurrency),
    };

    if (reservoir && Number.isFinite(reservoir)) {
        const amount = Math.max(1, Math.floor(reservoir));
        const options: Bottleneck.ConstructorOptions = {
            ...baseOptions,
            reservoir: amount,
            reservoirRefreshAmount: amount,
            reservoirRefreshInterval: ONE_MINUTE_MS,
        };
        return new Bottleneck(options);
    }

    return new Bottleneck(baseOptions);
}

/**
 * Limiter that leaves at least `delayMs` between the start of consecutive jobs.
 * With a concurrency of 1 the jobs are fully serialised.
 */
export function createPacedLimiter(delayMs: number, concurrency = 1): Bottleneck {
    return new Bottleneck({
        maxConcurrent: Math.max(1, Math.floor(concurrency)),
        minTime: Math.max(0, delayMs),
    });
}
