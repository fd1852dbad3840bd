// NOTE: opening hands are kept as notation strings; @cardsleuth/engine parses them
// Do NOT import @cardsleuth/protocol here - constants stay free of behavior
export * from './limits.js';
export * from './openings.js';
