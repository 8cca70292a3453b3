/** Uniform source in `[0, 1)`. */
export type RandomSource = () => number;

const SEED_FALLBACK = 1;

/** Seeds are unsigned 32-bit; zero and non-finite values fall back to 1. */
export const toSeed = (value: number): number => {
    const seed = Number.isFinite(value) ? value >>> 0 : 0;
    return seed === 0 ? SEED_FALLBACK : seed;
};

const drawSeed = (): number => {
    const buffer = new Uint32Array(1);
    globalThis.crypto.getRandomValues(buffer);
    return toSeed(buffer[0] ?? 0);
};

export const mulberry32 = (seed: number): RandomSource => {
    let state = toSeed(seed);
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = Math.imul(state ^ (state >>> 15), state | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
};

/**
 * Uniform sample from `[min, max)`. Equal bounds return `min`; reversed bounds
 * sample the same interval from the other end.
 */
export const sampleRange = (source: RandomSource, min: number, max: number): number =>
    min === max ? min : min + source() * (max - min);

/**
 * The one random stream of a play session. Restarts keep drawing from it, so a
 * seed pins down every run that follows, not just the first.
 */
export interface SessionRandom {
    readonly seed: () => number;
    readonly source: RandomSource;
    readonly range: (min: number, max: number) => number;
}

export const createSessionRandom = (seed?: number | null): SessionRandom => {
    const sessionSeed = seed === null || seed === undefined ? drawSeed() : toSeed(seed);
    const source = mulberry32(sessionSeed);
    return {
        seed: () => sessionSeed,
        source,
        range: (min, max) => sampleRange(source, min, max),
    };
};
