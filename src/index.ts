import 'reflect-metadata';

// Domain: generation, entropy, presets
export * from './domain/generation/index.js';
export * from './domain/wordlist/index.js';

// Errors
export * from './errors/index.js';

// Ports
export type { RandomEntropyPort } from './ports/random-entropy.port.js';
export type { FileSystemPort, FsError } from './ports/fs.port.js';

// DI Container exports
export { initializeContainer, container, resetContainer, ContainerConfigError } from './di/container.js';
export { DI } from './di/tokens.js';

// Services
export { GenerationService, type GeneratedBatch } from './application/services/generation-service.js';

// Infrastructure
export { NodeRandomEntropy } from './infrastructure/local/random-entropy/index.js';
export { NodeFileSystem } from './infrastructure/local/fs/index.js';
export {
  formatOutput,
  formatCsv,
  formatTxt,
  parseTxt,
  resolveOutputTarget,
  OUTPUT_FORMATS,
  type OutputFormat,
} from './infrastructure/output/output-format.js';
export { loadConfig, type AppConfig, type ValidatedConfig } from './config/app-config.js';
