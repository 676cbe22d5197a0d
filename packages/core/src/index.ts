export * from './ini/index.js';
