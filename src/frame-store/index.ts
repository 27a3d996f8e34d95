export * from './memory-frame-store';
export * from './y4m';
export * from './y4m-frame-store';
