// Barrel export for @cardsleuth/engine
export * from './errors.js';
export * from './cards.js';
export * from './feedback.js';
export * from './candidates.js';
export * from './opening.js';
export * from './refine.js';
export * from './solver.js';
