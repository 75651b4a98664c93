export * from './search';
export * from './aho-corasick';
export * from './suffix-array';
export * from './suffix-automaton';
export * from './alignment';
export * from './parser';
