export * from './playback.js';
export * from './config.js';
