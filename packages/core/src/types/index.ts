export * from './vcs.js';
