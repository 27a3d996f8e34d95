export * from './character-codec';
export * from './length-codec';
