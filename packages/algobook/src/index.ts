export * from './errors';
export * from './graph';
export * from './dfs';
export * from './flow';
export * from './matching';
export * from './paths';
export * from './strings';
export * from './numeric';
export * from './fenwick';
