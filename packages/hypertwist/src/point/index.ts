import { assertRotation } from '../rotation';
import type { Axis, Rotation } from '../rotation';

/** Position along one axis: 0 low face layer, 1 middle layer, 2 high face layer. */
export type Coord = 0 | 1 | 2;

export type PointJSON = {
  originalCoords: Coord[];
  coords: Coord[];
  orientation: Axis[];
};

/** Added to a point's incorrectness when its orientation is not the identity. */
export const ORIENTATION_PENALTY = 10;

/**
 * Quarter turn of a 3x3 layer, indexed by [coords[from]][coords[to]] and
 * yielding the new [coords[from], coords[to]]. Four applications are the identity.
 */
export const QUARTER_TURN: ReadonlyArray<ReadonlyArray<readonly [Coord, Coord]>> = [
  [
    [2, 0],
    [1, 0],
    [0, 0],
  ],
  [
    [2, 1],
    [1, 1],
    [0, 1],
  ],
  [
    [2, 2],
    [1, 2],
    [0, 2],
  ],
];

export function isCoord(value: number): value is Coord {
  return value === 0 || value === 1 || value === 2;
}

export function quarterTurn(from: number, to: number): readonly [Coord, Coord] {
  const next = QUARTER_TURN[from]?.[to];
  if (!next) {
    throw new Error(`Unreachable layer coordinates (${from}, ${to}).`);
  }
  return next;
}

export function coordsFromIndex(index: number, dims: number): Coord[] {
  const coords: Coord[] = [];
  let rest = index;
  for (let axis = 0; axis < dims; axis += 1) {
    const digit = rest % 3;
    if (!isCoord(digit)) throw new Error(`Invalid point index ${index}.`);
    coords.push(digit);
    rest = Math.floor(rest / 3);
  }
  return coords;
}

export function identityOrientation(dims: number): Axis[] {
  return Array.from({ length: dims }, (_, i) => i);
}

export class Point {
  readonly originalCoords: ReadonlyArray<Coord>;
  private readonly _coords: Coord[];
  private readonly _orientation: Axis[];

  constructor(originalCoords: ReadonlyArray<Coord>, coords: ReadonlyArray<Coord>, orientation: ReadonlyArray<Axis>) {
    if (coords.length !== originalCoords.length || orientation.length !== originalCoords.length) {
      throw new Error(
        `Point vectors disagree on dimensionality (${originalCoords.length}, ${coords.length}, ${orientation.length}).`,
      );
    }
    this.originalCoords = Object.freeze([...originalCoords]);
    this._coords = [...coords];
    this._orientation = [...orientation];
  }

  static create(coords: ReadonlyArray<Coord>): Point {
    return new Point(coords, coords, identityOrientation(coords.length));
  }

  static fromIndex(index: number, dims: number): Point {
    return Point.create(coordsFromIndex(index, dims));
  }

  static fromJSON(json: PointJSON): Point {
    return new Point(json.originalCoords, json.coords, json.orientation);
  }

  get dims(): number {
    return this.originalCoords.length;
  }

  coords(): Coord[] {
    return [...this._coords];
  }

  orientation(): Axis[] {
    return [...this._orientation];
  }

  /** Applies `r` in place. Returns false when the point is not on the addressed layer. */
  rotate(r: Rotation): boolean {
    assertRotation(r, this.dims);
    if (this._coords[r.axis] !== r.side) return false;

    const slot = this._orientation[r.from];
    this._orientation[r.from] = this._orientation[r.to];
    this._orientation[r.to] = slot;

    const [from, to] = quarterTurn(this._coords[r.from], this._coords[r.to]);
    this._coords[r.from] = from;
    this._coords[r.to] = to;
    return true;
  }

  isInOriginalPosition(): boolean {
    return this._coords.every((c, axis) => c === this.originalCoords[axis]);
  }

  isInOriginalOrientation(): boolean {
    for (let i = 1; i < this._orientation.length; i += 1) {
      if (this._orientation[i - 1] > this._orientation[i]) return false;
    }
    return true;
  }

  // Face-center analogue: its orientation cannot be observed.
  isCenter(): boolean {
    return this._coords.filter((c) => c === 1).length === this.dims - 1;
  }

  distFromOriginal(): number {
    return this._coords.reduce<number>((sum, c, axis) => sum + Math.abs(c - this.originalCoords[axis]), 0);
  }

  incorrectness(penalty = ORIENTATION_PENALTY): number {
    return this.distFromOriginal() + (this.isInOriginalOrientation() ? 0 : penalty);
  }

  sameStateAs(other: Point): boolean {
    return (
      this.dims === other.dims &&
      this.originalCoords.every((c, axis) => c === other.originalCoords[axis]) &&
      this._coords.every((c, axis) => c === other._coords[axis]) &&
      this._orientation.every((a, slot) => a === other._orientation[slot])
    );
  }

  clone(): Point {
    return new Point(this.originalCoords, this._coords, this._orientation);
  }

  toJSON(): PointJSON {
    return {
      originalCoords: [...this.originalCoords],
      coords: this.coords(),
      orientation: this.orientation(),
    };
  }
}
