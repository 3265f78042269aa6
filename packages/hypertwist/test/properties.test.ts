import { describe, expect, it } from 'vitest';
import fc from 'fast-check';

import { Cube, validateCubeState } from '../src/cube';
import { createSeededRandom } from '../src/random';
import { randomRotation } from '../src/rotation';

const scrambled = (dims: number, seed: number, moves: number) => {
  const random = createSeededRandom(seed);
  const cube = new Cube(dims);
  cube.shuffle(moves, random);
  return { cube, rotation: randomRotation(dims, random) };
};

const cubeArb = fc.record({
  dims: fc.integer({ min: 3, max: 5 }),
  seed: fc.integer(),
  moves: fc.integer({ min: 0, max: 12 }),
});

describe('property checks', () => {
  it('a quarter turn has order four', () => {
    fc.assert(
      fc.property(cubeArb, ({ dims, seed, moves }) => {
        const { cube, rotation } = scrambled(dims, seed, moves);
        const before = cube.clone();
        cube.rotateN(rotation, 4);
        expect(cube.equals(before)).toBe(true);
      }),
      { numRuns: 30 },
    );
  });

  it('undoRotation restores every point', () => {
    fc.assert(
      fc.property(cubeArb, ({ dims, seed, moves }) => {
        const { cube, rotation } = scrambled(dims, seed, moves);
        const before = cube.clone();
        cube.rotate(rotation);
        cube.undoRotation(rotation);
        expect(cube.equals(before)).toBe(true);
      }),
      { numRuns: 30 },
    );
  });

  it('only points on the turned layer change', () => {
    fc.assert(
      fc.property(cubeArb, ({ dims, seed, moves }) => {
        const { cube, rotation } = scrambled(dims, seed, moves);
        const before = cube.clone();
        const moved = cube.rotate(rotation);
        expect(moved).toBe(3 ** (dims - 1));
        cube.points().forEach((point, index) => {
          const old = before.point(index);
          if (old.coords()[rotation.axis] !== rotation.side) {
            expect(point.sameStateAs(old)).toBe(true);
          } else {
            expect(point.coords()[rotation.axis]).toBe(rotation.side);
          }
        });
      }),
      { numRuns: 30 },
    );
  });

  it('rotations permute the coordinate space', () => {
    fc.assert(
      fc.property(cubeArb, ({ dims, seed, moves }) => {
        const { cube } = scrambled(dims, seed, moves);
        expect(validateCubeState(cube.toJSON())).toEqual({ ok: true, errors: [] });
        const occupied = new Set(cube.points().map((p) => p.coords().join(',')));
        expect(occupied.size).toBe(3 ** dims);
      }),
      { numRuns: 30 },
    );
  });

  it('a fresh cube is solved at every dimensionality', () => {
    fc.assert(
      fc.property(fc.integer({ min: 3, max: 6 }), (dims) => {
        const cube = new Cube(dims);
        expect(cube.isSolved()).toBe(true);
        expect(cube.unsolvedness()).toBe(0);
      }),
      { numRuns: 4 },
    );
  });
});
