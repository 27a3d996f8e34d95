export * from './frame-store.interface';
export * from './pixel-frame.interface';
export * from './stego-config.interface';
export * from './stego-error.interface';
