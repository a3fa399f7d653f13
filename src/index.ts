export * from './chess/index.js';
