import { parseArgs } from 'node:util';

export type CliConfig = {
  dims: number;
  shuffle: number;
  seed: string | null;
  color: boolean;
  reportEvery: number;
  maxIterations: number;
};

export const DEFAULT_CONFIG: CliConfig = {
  dims: 3,
  shuffle: 100,
  seed: null,
  color: true,
  reportEvery: 1000,
  maxIterations: Infinity,
};

const parseIntClamped = (value: string | undefined, fallback: number, min: number, max: number) => {
  if (value === undefined) return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) return fallback;
  const rounded = Math.floor(parsed);
  return Math.max(min, Math.min(max, rounded));
};

export function parseCliConfig(argv: string[], env: NodeJS.ProcessEnv = {}): CliConfig {
  const { values } = parseArgs({
    args: argv,
    options: {
      dims: { type: 'string', short: 'd' },
      shuffle: { type: 'string', short: 's' },
      seed: { type: 'string' },
      'no-color': { type: 'boolean' },
      'report-every': { type: 'string' },
      'max-iterations': { type: 'string' },
    },
    strict: true,
    allowPositionals: false,
  });

  const seed = values.seed ?? env.HYPERTWIST_SEED ?? null;
  const noColor = values['no-color'] === true || (env.NO_COLOR !== undefined && env.NO_COLOR !== '');

  return {
    dims: parseIntClamped(values.dims, DEFAULT_CONFIG.dims, 3, 6),
    shuffle: parseIntClamped(values.shuffle, DEFAULT_CONFIG.shuffle, 0, 10000),
    seed: seed === '' ? null : seed,
    color: !noColor,
    reportEvery: parseIntClamped(values['report-every'], DEFAULT_CONFIG.reportEvery, 1, 1_000_000),
    maxIterations: parseIntClamped(values['max-iterations'], DEFAULT_CONFIG.maxIterations, 1, Number.MAX_SAFE_INTEGER),
  };
}
