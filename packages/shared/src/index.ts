export * from './types/game-record.js';
export * from './types/division.js';
export * from './types/swap.js';
export * from './types/swap-export.js';
