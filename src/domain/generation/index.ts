export * from './types.js';
export * from './character-classes.js';
export * from './errors.js';
export * from './secure-random.js';
export * from './password-generator.js';
export * from './passphrase-generator.js';
export * from './generate-many.js';
export * from './entropy.js';
export * from './presets.js';
