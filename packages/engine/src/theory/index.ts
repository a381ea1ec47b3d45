export * from './pitch.js';
export * from './duration.js';
