/**
 * Seeded pseudo-random number generator
 * Linear congruential generator, so k-means seeding is reproducible per seed
 */

export class SeededRNG {
    private state: number;

    constructor(seed: number) {
        // Non-integer, negative or zero seeds collapse onto a positive integer
        this.state = Math.floor(Math.abs(seed)) || 1;
    }

    /**
     * Next value in [0, 1)
     */
    next(): number {
        // Numerical Recipes LCG constants, kept in 32 bits
        this.state = (Math.imul(this.state, 1664525) + 1013904223) >>> 0;
        return this.state / 4294967296;
    }

    /**
     * Integer in [0, max)
     */
    nextInt(max: number): number {
        return Math.floor(this.next() * max);
    }
}
