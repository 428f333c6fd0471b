export * from './core/squircle';
export * from './core/distribute';
export * from './core/corner';
export * from './core/path';
export * from './types';
