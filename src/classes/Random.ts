import type { RandomSource } from '../types';

/**
 * Seedable uniform source (mulberry32). Same seed, same roll sequence.
 */
export class SeededRandom implements RandomSource {
    private state: number;

    constructor(seed: number = Date.now()) {
        this.state = seed >>> 0;
    }

    public next(): number {
        this.state = (this.state + 0x6D2B79F5) >>> 0;
        let t = this.state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    }

    public weightedChoice(weights: readonly number[]): number {
        return weightedIndex(weights, this.next());
    }

    public bernoulli(p: number): boolean {
        return this.next() < p;
    }

    public integer(min: number, max: number): number {
        return min + Math.floor(this.next() * (max - min + 1));
    }
}

/**
 * Maps a uniform draw onto an index of `weights`. Non-positive weights are
 * never chosen.
 */
export function weightedIndex(weights: readonly number[], roll: number): number {
    const total = weights.reduce((sum, w) => sum + Math.max(0, w), 0);
    if (weights.length === 0 || total <= 0) {
        throw new RangeError('weightedIndex needs at least one positive weight');
    }

    let target = roll * total;
    let last = -1;
    for (let i = 0; i < weights.length; i++) {
        if (weights[i] <= 0) continue;
        last = i;
        if (target < weights[i]) return i;
        target -= weights[i];
    }
    // Float drift on roll ~ 1
    return last;
}
