export * from './cards.js';
export * from './game.js';
// NOTE: card notation lives in @cardsleuth/protocol
// Do NOT add parsing or formatting here - types stay free of behavior
