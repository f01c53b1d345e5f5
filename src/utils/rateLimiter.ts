import Bottleneck from "bottleneck";

const ONE_MINUTE_MS = 60_000;

export interface RateLimiterOptions {
    concurrency: number;
    /** Budget refilled every minute: requests, or tokens when scheduled by weight. */
    perMinute?: number;
}

export function createRateLimiter({ concurrency, perMinute }: RateLimiterOptions): Bottleneck {
    const maxConcurrent = Math.max(1, concurrency);

    if (!perMinute || !Number.isFinite(perMinute)) {
        return new Bottleneck({ maxConcurrent });
    }

    const amount = Math.max(1, Math.floor(perMinute));
    const options: Bottleneck.ConstructorOptions = {
        maxConcurrent,
        reservoir: amount,
        reservoirRefreshAmount: amount,
        reservoirRefreshInterval: ONE_MINUTE_MS,
    };
    return new Bottleneck(options);
}

/** Waits until `weight` units of the limiter's reservoir are available. */
export async function reserveWeight(limiter: Bottleneck | undefined, weight: number): Promise<void> {
    if (!limiter || weight <= 0) {
        return;
    }
    await limiter.schedule({ weight: Math.max(1, Math.ceil(weight)) }, async () => undefined);
}
