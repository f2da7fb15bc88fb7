export * from './benchmark.js';
export * from './schemas/config.js';
export * from './schemas/report.js';
export * from './schemas/ollama.js';
