export * from './statistics.js';
export * from './severity.js';
export * from './drift-monitor.js';
export * from './history-recorder.js';
