import type { Cube } from '../cube';
import type { Point } from '../point';

export type RenderOptions = {
  color?: boolean;
};

const RED = '\u001b[31m';
const GREEN = '\u001b[32m';
const RESET = '\u001b[0m';

const highlight = (text: string, good: boolean, color: boolean) => {
  if (!color) return text;
  return `${good ? GREEN : RED}${text}${RESET}`;
};

export function formatPoint(point: Point, options: RenderOptions = {}): string {
  const color = options.color ?? false;
  const coords = highlight(point.coords().join(' '), point.isInOriginalPosition(), color);
  const orientation = highlight(point.orientation().join(' '), point.isInOriginalOrientation(), color);
  return [
    `Current coordinates: ${coords}`,
    `Orientation: ${orientation}`,
    `Original coordinates: ${point.originalCoords.join(' ')}`,
  ].join('  ');
}

export function formatCube(cube: Cube, options: RenderOptions = {}): string {
  const lines = ['Current state:'];
  for (const point of cube.points()) {
    lines.push(formatPoint(point, options));
  }
  lines.push(`Solved? ${cube.isSolved() ? 'Yes' : 'No'}`);
  lines.push(`Unsolvedness: ${cube.unsolvedness()}`);
  return lines.join('\n');
}
