// Barrel export for @cardsleuth/protocol
export * from './errors.js';
export * from './notation.js';
export * from './validation.js';
