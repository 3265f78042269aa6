import type { RandomSource } from '../src/random';

/** Replays `values` in order, wrapping around at the end. */
export const scriptedRandom = (values: number[]): RandomSource => {
  let index = 0;
  return () => {
    const value = values[index % values.length];
    index += 1;
    return value;
  };
};

/** Index of the point at `coords` in a cube's base-3 enumeration (axis 0 least significant). */
export const indexOf = (coords: number[]): number =>
  coords.reduce((sum, c, axis) => sum + c * 3 ** axis, 0);
