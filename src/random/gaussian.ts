import { Effect, Random } from "effect";

// Box-Muller over the ambient Random service, so `Effect.withRandom(Random.make(seed))`
// makes every draw reproducible.
export const nextGaussian = (mean: number, standardDeviation: number): Effect.Effect<number> =>
  Effect.gen(function* () {
    if (standardDeviation === 0) {
      return mean;
    }

    const u1 = 1 - (yield* Random.next); // (0, 1], keeps log finite
    const u2 = yield* Random.next;
    const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);

    return mean + z * standardDeviation;
  });
