import { isSide, validateRotation } from '../rotation';
import type { Rotation } from '../rotation';

export type ParseResult<T> = { ok: true; value: T } | { ok: false; errors: string[] };

const COMMAND_PATTERN = /^\d{4}$/;

/**
 * Parses one four-digit command: axis, from, to, side (e.g. `1202`).
 * Axes are single digits, so only the first ten axes are addressable.
 */
export function parseRotation(text: string, dims: number): ParseResult<Rotation> {
  const command = text.trim();
  if (!COMMAND_PATTERN.test(command)) {
    return { ok: false, errors: [`"${command}" is not four digits (axis, from, to, side).`] };
  }

  const [axis, from, to, side] = Array.from(command, (ch) => Number(ch));
  if (!isSide(side)) {
    return { ok: false, errors: [`"${command}": side must be 0 or 2, got ${side}.`] };
  }

  const rotation: Rotation = Object.freeze({ axis, from, to, side });
  const report = validateRotation(rotation, dims);
  if (!report.ok) {
    return { ok: false, errors: report.errors.map((error) => `"${command}": ${error}`) };
  }
  return { ok: true, value: rotation };
}

/** Parses a comma-separated list such as `1202,0120`. Every command is checked before any is returned. */
export function parseRotations(text: string, dims: number): ParseResult<Rotation[]> {
  const parts = text.split(',').map((part) => part.trim());
  if (parts.every((part) => part.length === 0)) {
    return { ok: false, errors: ['No rotation given.'] };
  }

  const rotations: Rotation[] = [];
  const errors: string[] = [];
  for (const part of parts) {
    const parsed = parseRotation(part, dims);
    if (parsed.ok) rotations.push(parsed.value);
    else errors.push(...parsed.errors);
  }

  if (errors.length > 0) return { ok: false, errors };
  return { ok: true, value: rotations };
}
