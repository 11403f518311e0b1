/** Returns a float in [0, 1), like `Math.random`. */
export type RandomSource = () => number;

/**
 * Seeded mulberry32 generator, for runs that need a reproducible random pick.
 */
export function createSeededRandom(seed: number): RandomSource {
    let state = seed >>> 0;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

export function pickRandom<T>(items: readonly T[], random: RandomSource): T | undefined {
    if (items.length === 0) {
        return undefined;
    }
    const randomIndex = Math.floor(random() * items.length);
    return items[randomIndex];
}
