import { describe, expect, it } from 'vitest';

import { Point, QUARTER_TURN, coordsFromIndex, quarterTurn } from '../src/point';
import type { Coord } from '../src/point';
import { createRotation } from '../src/rotation';

describe('point', () => {
  it('enumerates coordinates in base 3 with axis 0 least significant', () => {
    expect(coordsFromIndex(0, 3)).toEqual([0, 0, 0]);
    expect(coordsFromIndex(5, 3)).toEqual([2, 1, 0]);
    expect(coordsFromIndex(26, 3)).toEqual([2, 2, 2]);
    expect(coordsFromIndex(30, 4)).toEqual([0, 1, 0, 1]);

    const p = Point.fromIndex(5, 3);
    expect(p.coords()).toEqual([2, 1, 0]);
    expect(p.originalCoords).toEqual([2, 1, 0]);
    expect(p.orientation()).toEqual([0, 1, 2]);
  });

  it('turns a layer pair by the quarter-turn table', () => {
    const expected: Array<[[Coord, Coord], [Coord, Coord]]> = [
      [[0, 0], [2, 0]],
      [[0, 1], [1, 0]],
      [[0, 2], [0, 0]],
      [[1, 0], [2, 1]],
      [[1, 1], [1, 1]],
      [[1, 2], [0, 1]],
      [[2, 0], [2, 2]],
      [[2, 1], [1, 2]],
      [[2, 2], [0, 2]],
    ];
    for (const [[a, b], after] of expected) {
      expect(quarterTurn(a, b)).toEqual(after);
    }
    const images = new Set(QUARTER_TURN.flat().map(([a, b]) => `${a},${b}`));
    expect(images.size).toBe(9);
  });

  it('rejects pairs outside the table', () => {
    expect(() => quarterTurn(3, 0)).toThrow(/Unreachable layer coordinates \(3, 0\)/);
    expect(() => quarterTurn(1, -1)).toThrow(/Unreachable/);
  });

  it('rotates a point on the addressed layer', () => {
    const p = Point.create([0, 1, 2, 1]);
    const moved = p.rotate(createRotation(0, 1, 2, 0, 4));
    expect(moved).toBe(true);
    expect(p.coords()).toEqual([0, 0, 1, 1]);
    expect(p.orientation()).toEqual([0, 2, 1, 3]);
    expect(p.originalCoords).toEqual([0, 1, 2, 1]);
  });

  it('leaves points off the layer untouched', () => {
    const p = Point.create([2, 1, 2]);
    expect(p.rotate(createRotation(0, 1, 2, 0, 3))).toBe(false);
    expect(p.coords()).toEqual([2, 1, 2]);
    expect(p.orientation()).toEqual([0, 1, 2]);
  });

  it('returns to its start after four quarter turns', () => {
    const p = Point.create([2, 0, 1]);
    const start = p.clone();
    const r = createRotation(0, 2, 1, 2, 3);
    p.rotate(r);
    expect(p.sameStateAs(start)).toBe(false);
    p.rotate(r);
    p.rotate(r);
    p.rotate(r);
    expect(p.sameStateAs(start)).toBe(true);
  });

  it('refuses rotations that do not fit its dimensionality', () => {
    const p = Point.create([0, 0, 0]);
    expect(() => p.rotate({ axis: 0, from: 1, to: 3, side: 0 })).toThrow(/outside \[0, 3\)/);
  });

  it('scores displacement and orientation', () => {
    const p = Point.create([0, 1, 2]);
    expect(p.incorrectness()).toBe(0);
    p.rotate(createRotation(0, 1, 2, 0, 3));
    expect(p.coords()).toEqual([0, 0, 1]);
    expect(p.isInOriginalPosition()).toBe(false);
    expect(p.isInOriginalOrientation()).toBe(false);
    expect(p.distFromOriginal()).toBe(2);
    expect(p.incorrectness()).toBe(12);
    expect(p.incorrectness(0)).toBe(2);
  });

  it('recognises face centers', () => {
    expect(Point.create([1, 1, 0]).isCenter()).toBe(true);
    expect(Point.create([2, 1, 1]).isCenter()).toBe(true);
    expect(Point.create([1, 1, 1]).isCenter()).toBe(false);
    expect(Point.create([0, 1, 2]).isCenter()).toBe(false);
    expect(Point.create([1, 1, 1, 2]).isCenter()).toBe(true);
  });

  it('round-trips through JSON', () => {
    const p = Point.create([2, 2, 0]);
    p.rotate(createRotation(2, 0, 1, 0, 3));
    const copy = Point.fromJSON(p.toJSON());
    expect(copy.sameStateAs(p)).toBe(true);
    expect(copy.toJSON()).toEqual({ originalCoords: [2, 2, 0], coords: [0, 2, 0], orientation: [1, 0, 2] });
  });

  it('rejects vectors of mismatched length', () => {
    expect(() => new Point([0, 0, 0], [0, 0], [0, 1, 2])).toThrow(/disagree on dimensionality/);
  });
});
