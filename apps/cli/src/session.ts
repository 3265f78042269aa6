import { Cube, createSeededRandom, defaultRandom, formatCube, parseRotations } from 'hypertwist';
import type { RandomSource } from 'hypertwist';

import type { CliConfig } from './config';

export type Writer = {
  log: (line: string) => void;
  error: (line: string) => void;
};

export type CommandOutcome = 'continue' | 'quit';

export const HELP_TEXT = [
  'Enter rotations as four digits (like 1230), where',
  ' - the first digit is the axis to rotate around',
  ' - the second digit is the axis to rotate from',
  ' - the third digit is the axis to rotate to',
  ' - the fourth digit is the side to rotate (0 or 2)',
  'For example, turning the top face rotates around the Y axis (1),',
  'from the Z axis (2) to the X axis (0), on the high side (2): 1202.',
  'Several rotations can be chained with commas: 1202,0120.',
  'Other commands: show, solve, shuffle [n], reset, help, quit.',
].join('\n');

export class Session {
  readonly config: CliConfig;
  private readonly random: RandomSource;
  private readonly out: Writer;
  private cube: Cube;

  constructor(config: CliConfig, out: Writer) {
    this.config = config;
    this.out = out;
    this.random = config.seed === null ? defaultRandom : createSeededRandom(config.seed);
    this.cube = new Cube(config.dims, { random: this.random });
  }

  get state(): Cube {
    return this.cube;
  }

  start() {
    this.out.log(`The N-D Cube (where N is currently ${this.config.dims})`);
    this.out.log(HELP_TEXT);
    this.cube.shuffle(this.config.shuffle);
    this.show();
  }

  show() {
    this.out.log(formatCube(this.cube, { color: this.config.color }));
  }

  handle(line: string): CommandOutcome {
    const input = line.trim();
    if (input.length === 0) return 'continue';

    const [command, ...args] = input.split(/\s+/);
    switch (command.toLowerCase()) {
      case 'quit':
      case 'exit':
        return 'quit';
      case 'help':
        this.out.log(HELP_TEXT);
        return 'continue';
      case 'show':
        this.show();
        return 'continue';
      case 'reset':
        this.cube = new Cube(this.config.dims, { random: this.random });
        this.show();
        return 'continue';
      case 'shuffle':
        this.shuffle(args[0]);
        return 'continue';
      case 'solve':
        this.solve();
        return 'continue';
      default:
        this.rotate(input);
        return 'continue';
    }
  }

  private shuffle(countArg: string | undefined) {
    const count = countArg === undefined ? this.config.shuffle : Number(countArg);
    if (!Number.isInteger(count) || count < 0) {
      this.out.error(`Cannot shuffle "${countArg}" times; expected a non-negative integer.`);
      return;
    }
    this.cube.shuffle(count);
    this.show();
  }

  private rotate(input: string) {
    const parsed = parseRotations(input, this.config.dims);
    if (!parsed.ok) {
      for (const error of parsed.errors) this.out.error(error);
      return;
    }
    for (const rotation of parsed.value) this.cube.rotate(rotation);
    this.show();
  }

  private solve() {
    const result = this.cube.solve({
      maxIterations: this.config.maxIterations,
      onStep: (step) => {
        if (step.iteration % this.config.reportEvery === 0) {
          this.out.log(`${step.iteration}: unsolvedness ${step.unsolvedness}`);
        }
      },
    });
    if (result.solved) {
      this.out.log(`solved in ${result.moveCount} rotations.`);
    } else {
      this.out.log(`gave up after ${result.iterations} iterations (${result.moveCount} rotations kept).`);
    }
  }
}
