export * from './errors/index.js';
export * from './config/index.js';
export * from './rubrics/index.js';
export * from './transcript/index.js';
export * from './evidence/index.js';
export * from './scoring/index.js';
export * from './history/index.js';
export * from './gate/index.js';
export * from './judge/index.js';
export * from './report/index.js';
