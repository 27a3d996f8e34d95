export * from './config';
export * from './constants';
export * from './error-factory';
export * from './frame';
