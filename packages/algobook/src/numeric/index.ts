export * from './complex';
export * from './random';
export * from './laguerre';
export * from './rpoly';
export * from './integrate';
export * from './modular';
export * from './factor';
