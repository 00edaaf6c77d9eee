/**
 * Source of uniformly distributed numbers in [0, 1)
 */
export type RandomSource = () => number;

/**
 * Creates a deterministic mulberry32 generator from a 32-bit seed
 */
export function createSeededRandom(seed: number): RandomSource {
    let state = seed;

    return (): number => {
        state |= 0;
        state = (state + 0x6d2b79f5) | 0;
        let t = Math.imul(state ^ (state >>> 15), 1 | state);
        t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

/**
 * Seeded from `seed` when given, otherwise from the clock
 */
export function createRandomSource(seed?: number | null): RandomSource {
    return createSeededRandom(seed ?? Date.now());
}

/**
 * Picks one element uniformly; undefined for an empty list
 */
export function pickRandom<T>(items: readonly T[], random: RandomSource): T | undefined {
    if (items.length === 0) {
        return undefined;
    }
    return items[Math.floor(random() * items.length)];
}
