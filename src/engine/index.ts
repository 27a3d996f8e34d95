export * from './stego-engine';
