export * from './agents.js';
export * from './data.js';
export * from './events.js';
export type { GenerationProvider } from './provider.js';
export * from './results.js';
