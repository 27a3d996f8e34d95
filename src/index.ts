export * from './interfaces';
export * from './utils';
export * from './codec';
export * from './engine';
export * from './frame-store';
