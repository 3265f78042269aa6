import { Point, ORIENTATION_PENALTY, coordsFromIndex, isCoord } from '../point';
import type { PointJSON } from '../point';
import { MIN_DIMS, assertDims, assertRotation, randomRotation } from '../rotation';
import type { Rotation } from '../rotation';
import { defaultRandom } from '../random';
import type { RandomSource } from '../random';
import { solveCube } from '../solver';
import type { SolveOptions, SolveResult } from '../solver';

export type CubeOptions = {
  random?: RandomSource;
  orientationPenalty?: number;
};

export type CubeState = {
  dims: number;
  points: PointJSON[];
};

export type CubeReport = {
  ok: boolean;
  errors: string[];
};

export function pointCount(dims: number): number {
  return 3 ** dims;
}

export function validateCubeState(state: CubeState): CubeReport {
  const errors: string[] = [];
  const { dims } = state;
  if (!Number.isInteger(dims) || dims < MIN_DIMS) {
    return { ok: false, errors: [`Invalid dimensionality ${dims}.`] };
  }

  const expected = pointCount(dims);
  if (state.points.length !== expected) {
    errors.push(`Expected ${expected} points, found ${state.points.length}.`);
  }

  const occupied = new Map<string, number>();
  state.points.forEach((point, index) => {
    const home = coordsFromIndex(index, dims);
    if (
      point.originalCoords.length !== dims ||
      point.originalCoords.some((c, axis) => c !== home[axis])
    ) {
      errors.push(`Point ${index} has original coordinates ${point.originalCoords.join(',')}, expected ${home.join(',')}.`);
    }
    if (point.coords.length !== dims || !point.coords.every((c) => isCoord(c))) {
      errors.push(`Point ${index} has coordinates outside {0,1,2}^${dims}.`);
    }
    const sorted = [...point.orientation].sort((a, b) => a - b);
    if (sorted.length !== dims || sorted.some((axis, i) => axis !== i)) {
      errors.push(`Point ${index} orientation ${point.orientation.join(',')} is not a permutation of 0..${dims - 1}.`);
    }
    const key = point.coords.join(',');
    occupied.set(key, (occupied.get(key) ?? 0) + 1);
  });

  for (const [key, count] of occupied.entries()) {
    if (count > 1) errors.push(`Coordinates ${key} are occupied by ${count} points.`);
  }

  return { ok: errors.length === 0, errors };
}

export class Cube {
  readonly dims: number;
  private readonly _points: Point[];
  private readonly random: RandomSource;
  private readonly orientationPenalty: number;

  constructor(dims: number, options: CubeOptions = {}) {
    assertDims(dims);
    this.dims = dims;
    this.random = options.random ?? defaultRandom;
    this.orientationPenalty = options.orientationPenalty ?? ORIENTATION_PENALTY;
    this._points = Array.from({ length: pointCount(dims) }, (_, index) => Point.fromIndex(index, dims));
  }

  static fromJSON(state: CubeState, options: CubeOptions = {}): Cube {
    const report = validateCubeState(state);
    if (!report.ok) throw new Error(`Invalid cube state: ${report.errors.join(' ')}`);
    const cube = new Cube(state.dims, options);
    cube._points.splice(0, cube._points.length, ...state.points.map((point) => Point.fromJSON(point)));
    return cube;
  }

  pointCount(): number {
    return this._points.length;
  }

  points(): ReadonlyArray<Point> {
    return this._points;
  }

  point(index: number): Point {
    const point = this._points[index];
    if (!point) throw new Error(`Point ${index} not found`);
    return point;
  }

  /** Applies `r` to every point and returns how many sat on the turned layer. */
  rotate(r: Rotation): number {
    assertRotation(r, this.dims);
    let moved = 0;
    for (const point of this._points) {
      if (point.rotate(r)) moved += 1;
    }
    return moved;
  }

  rotateN(r: Rotation, n: number) {
    for (let i = 0; i < n; i += 1) {
      this.rotate(r);
    }
  }

  undoRotation(r: Rotation) {
    this.rotateN(r, 3);
  }

  isSolved(): boolean {
    return this._points.every(
      (p) => p.isInOriginalPosition() && (p.isInOriginalOrientation() || p.isCenter()),
    );
  }

  unsolvedness(): number {
    return this._points.reduce((sum, p) => sum + p.incorrectness(this.orientationPenalty), 0);
  }

  shuffle(times: number, random: RandomSource = this.random): Rotation[] {
    const applied: Rotation[] = [];
    for (let i = 0; i < times; i += 1) {
      const r = randomRotation(this.dims, random);
      this.rotate(r);
      applied.push(r);
    }
    return applied;
  }

  solve(options: SolveOptions = {}): SolveResult {
    return solveCube(this, { ...options, random: options.random ?? this.random });
  }

  equals(other: Cube): boolean {
    return (
      this.dims === other.dims &&
      this._points.length === other._points.length &&
      this._points.every((p, index) => p.sameStateAs(other.point(index)))
    );
  }

  clone(): Cube {
    return Cube.fromJSON(this.toJSON(), { random: this.random, orientationPenalty: this.orientationPenalty });
  }

  toJSON(): CubeState {
    return { dims: this.dims, points: this._points.map((p) => p.toJSON()) };
  }
}
