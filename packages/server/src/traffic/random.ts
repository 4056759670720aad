import seedrandom from 'seedrandom';

/** Uniform numbers in [0, 1). One source per run. */
export type RandomSource = () => number;

/** Seeded generator; the same seed always yields the same sequence */
export function createRandomSource(seed: number): RandomSource {
  const prng = seedrandom(String(seed));
  return () => prng();
}

/** Replays fixed values in a loop. For tests and scripted scenarios. */
export function sequenceRandomSource(values: number[]): RandomSource {
  if (values.length === 0) {
    throw new Error('sequenceRandomSource needs at least one value');
  }
  let i = 0;
  return () => {
    const v = values[i % values.length];
    i++;
    return v;
  };
}
