/** Returns numbers in [0, 1). */
export type RandomSource = () => number;

/**
 * Seeded random number generator (Mulberry32)
 *
 * @param seed - Integer seed value
 */
export function seededRandom(seed: number): RandomSource {
    return function() {
        seed |= 0;
        seed = seed + 0x6D2B79F5 | 0;
        let t = Math.imul(seed ^ seed >>> 15, 1 | seed);
        t = t + Math.imul(t ^ t >>> 7, 61 | t) ^ t;
        return ((t ^ t >>> 14) >>> 0) / 4294967296;
    };
}

/**
 * Sample a triangular distribution over [min, max] with its peak at mode,
 * by inverting the CDF at a single uniform draw.
 */
export function triangular(rng: RandomSource, min: number, mode: number, max: number): number {
    if (!(min <= mode && mode <= max)) {
        throw new RangeError(`expected min <= mode <= max, got ${min}, ${mode}, ${max}`);
    }
    if (min === max) return min;

    const u = rng();
    const c = (mode - min) / (max - min);
    if (u < c) {
        return min + Math.sqrt(u * (max - min) * (mode - min));
    }
    return max - Math.sqrt((1 - u) * (max - min) * (max - mode));
}
