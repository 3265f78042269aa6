import { defaultRandom, randomChoice, randomInt } from '../random';
import type { RandomSource } from '../random';

export type Axis = number;

/** Layer addressed along the rotation axis: 0 is the low face, 2 the high face. */
export type Side = 0 | 2;

export const SIDES: readonly Side[] = [0, 2];

export const MIN_DIMS = 3;

/**
 * A quarter turn of one layer. The layer is `coords[axis] === side`; within it
 * the `from` axis is turned towards the `to` axis.
 */
export type Rotation = Readonly<{
  axis: Axis;
  from: Axis;
  to: Axis;
  side: Side;
}>;

export type RotationReport = {
  ok: boolean;
  errors: string[];
};

export function isSide(value: number): value is Side {
  return value === 0 || value === 2;
}

export function assertDims(dims: number) {
  if (!Number.isInteger(dims) || dims < MIN_DIMS) {
    throw new Error(`Cube dimensionality must be an integer >= ${MIN_DIMS}, got ${dims}.`);
  }
}

export function validateRotation(rotation: Rotation, dims: number): RotationReport {
  const errors: string[] = [];
  const axes = [
    ['axis', rotation.axis],
    ['from', rotation.from],
    ['to', rotation.to],
  ] as const;

  for (const [name, value] of axes) {
    if (!Number.isInteger(value) || value < 0 || value >= dims) {
      errors.push(`Rotation ${name} ${value} is outside [0, ${dims}).`);
    }
  }
  if (rotation.axis === rotation.from || rotation.from === rotation.to || rotation.to === rotation.axis) {
    errors.push(
      `Rotation axes must be distinct (axis ${rotation.axis}, from ${rotation.from}, to ${rotation.to}).`,
    );
  }
  if (!isSide(rotation.side)) {
    errors.push(`Rotation side ${rotation.side} must be 0 or 2.`);
  }

  return { ok: errors.length === 0, errors };
}

export function assertRotation(rotation: Rotation, dims: number) {
  const report = validateRotation(rotation, dims);
  if (!report.ok) {
    throw new Error(`Invalid rotation ${formatRotation(rotation)}: ${report.errors.join(' ')}`);
  }
}

export function createRotation(axis: Axis, from: Axis, to: Axis, side: number, dims: number): Rotation {
  if (!isSide(side)) {
    throw new Error(`Invalid rotation ${axis}${from}${to}${side}: side must be 0 or 2.`);
  }
  const rotation: Rotation = Object.freeze({ axis, from, to, side });
  assertRotation(rotation, dims);
  return rotation;
}

export function randomRotation(dims: number, random: RandomSource = defaultRandom): Rotation {
  assertDims(dims);
  const side = randomChoice(random, SIDES);
  const axis = randomInt(random, dims);
  const axes = Array.from({ length: dims }, (_, i) => i);
  const from = randomChoice(
    random,
    axes.filter((a) => a !== axis),
  );
  const to = randomChoice(
    random,
    axes.filter((a) => a !== axis && a !== from),
  );
  return Object.freeze({ axis, from, to, side });
}

export function formatRotation(rotation: Rotation): string {
  return `${rotation.axis}${rotation.from}${rotation.to}${rotation.side}`;
}

export function rotationsEqual(a: Rotation, b: Rotation): boolean {
  return a.axis === b.axis && a.from === b.from && a.to === b.to && a.side === b.side;
}
