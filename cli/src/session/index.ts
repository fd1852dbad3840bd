export * from './guessing-session.js';
export * from './repl.js';
