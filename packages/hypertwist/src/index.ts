export * from './random';
export * from './rotation';
export * from './point';
export * from './cube';
export * from './solver';
export * from './notation';
export * from './render';
