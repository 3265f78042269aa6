import type { Cube } from '../cube';
import { defaultRandom, randomInt } from '../random';
import type { RandomSource } from '../random';
import { randomRotation } from '../rotation';
import type { Rotation } from '../rotation';

/** Chance, in percent, of keeping a move that made the cube more unsolved. */
export const DEFAULT_ACCEPT_WORSE_PERCENT = 10;
/** Chance, in percent, of reverting a move that did not make the cube worse. */
export const DEFAULT_REVERT_BETTER_PERCENT = 10;

export type AcceptanceOptions = {
  acceptWorsePercent?: number;
  revertBetterPercent?: number;
};

export type SolveStep = {
  iteration: number;
  rotation: Rotation;
  before: number;
  after: number;
  kept: boolean;
  unsolvedness: number;
  historyLength: number;
};

export type SolveOptions = AcceptanceOptions & {
  random?: RandomSource;
  maxIterations?: number;
  onStep?: (step: SolveStep) => void;
};

export type SolveResult = {
  solved: boolean;
  moves: Rotation[];
  moveCount: number;
  iterations: number;
};

/** `draw` is an integer in [0, 100). */
export function shouldKeepMove(before: number, after: number, draw: number, options: AcceptanceOptions = {}): boolean {
  const acceptWorse = options.acceptWorsePercent ?? DEFAULT_ACCEPT_WORSE_PERCENT;
  const revertBetter = options.revertBetterPercent ?? DEFAULT_REVERT_BETTER_PERCENT;
  if (after > before) return draw < acceptWorse;
  return draw >= revertBetter;
}

/**
 * Randomized hill climb. Each iteration applies a random rotation and keeps it
 * or undoes it according to {@link shouldKeepMove}; runs until the cube is
 * solved or `maxIterations` is exhausted (unbounded by default).
 */
export function solveCube(cube: Cube, options: SolveOptions = {}): SolveResult {
  const random = options.random ?? defaultRandom;
  const maxIterations = options.maxIterations ?? Infinity;
  if (!(maxIterations >= 0)) throw new Error(`maxIterations must be non-negative, got ${maxIterations}.`);

  const moves: Rotation[] = [];
  let iterations = 0;

  while (!cube.isSolved()) {
    if (iterations >= maxIterations) {
      return { solved: false, moves, moveCount: moves.length, iterations };
    }
    iterations += 1;

    const before = cube.unsolvedness();
    const rotation = randomRotation(cube.dims, random);
    cube.rotate(rotation);
    moves.push(rotation);

    const draw = randomInt(random, 100);
    const after = cube.unsolvedness();
    const kept = shouldKeepMove(before, after, draw, options);
    if (!kept) {
      cube.undoRotation(rotation);
      moves.pop();
    }

    options.onStep?.({
      iteration: iterations,
      rotation,
      before,
      after,
      kept,
      unsolvedness: kept ? after : before,
      historyLength: moves.length,
    });
  }

  return { solved: true, moves, moveCount: moves.length, iterations };
}
