import 'reflect-metadata';
import { container, instanceCachingFactory } from 'tsyringe';
import { DI } from './tokens.js';
import { assertNever } from '../runtime/assert-never.js';
import type { RuntimeMode } from '../runtime/runtime-mode.js';
import type { ProcessTerminator } from '../runtime/ports/process-terminator.js';
import { NodeProcessTerminator } from '../runtime/adapters/node-process-terminator.js';
import { ThrowingProcessTerminator } from '../runtime/adapters/throwing-process-terminator.js';
import type { ValidatedConfig } from '../config/app-config.js';
import { loadConfig } from '../config/app-config.js';
import type { ConfigInvalidError } from '../errors/app-error.js';
import type { RandomEntropyPort } from '../ports/random-entropy.port.js';
import type { FileSystemPort } from '../ports/fs.port.js';
import { NodeRandomEntropy } from '../infrastructure/local/random-entropy/index.js';
import { NodeFileSystem } from '../infrastructure/local/fs/index.js';
import { PinoLoggerFactory } from '../core/logging/create-logger.js';
import { createBootstrapLogger } from '../core/logging/bootstrap.js';

const log = createBootstrapLogger('container');

let initialized = false;

export interface ContainerInitOptions {
  readonly runtimeMode?: RuntimeMode;
}

/**
 * Raised when the environment does not parse. Carries the structured error so
 * the entrypoint can print it.
 */
export class ContainerConfigError extends Error {
  constructor(readonly error: ConfigInvalidError) {
    super(error.message);
    this.name = 'ContainerConfigError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════

function registerConfig(): void {
  // Tests register a config first; the composition root must not overwrite it.
  if (container.isRegistered(DI.Config.App)) return;

  const configResult = loadConfig({ env: process.env, cwd: process.cwd() });
  if (configResult.isErr()) {
    throw new ContainerConfigError(configResult.error);
  }
  container.register<ValidatedConfig>(DI.Config.App, { useValue: configResult.value });
}

// ═══════════════════════════════════════════════════════════════════════════
// RUNTIME
// ═══════════════════════════════════════════════════════════════════════════

function detectRuntimeMode(): RuntimeMode {
  // Env access is allowed here (composition root) and nowhere else.
  if (process.env['VITEST'] || process.env['NODE_ENV'] === 'test') {
    return { kind: 'test' };
  }
  return { kind: 'library' };
}

function createTerminator(mode: RuntimeMode): ProcessTerminator {
  switch (mode.kind) {
    case 'test':
      return new ThrowingProcessTerminator();
    case 'cli':
    case 'library':
      return new NodeProcessTerminator();
    default:
      return assertNever(mode);
  }
}

function registerRuntime(options: ContainerInitOptions): void {
  const mode = options.runtimeMode ?? detectRuntimeMode();
  container.register<RuntimeMode>(DI.Runtime.Mode, { useValue: mode });
  container.register<ProcessTerminator>(DI.Runtime.ProcessTerminator, { useValue: createTerminator(mode) });
}

// ═══════════════════════════════════════════════════════════════════════════
// PORTS & SERVICES
// ═══════════════════════════════════════════════════════════════════════════

function registerPorts(): void {
  if (!container.isRegistered(DI.Logging.Factory)) {
    container.register(DI.Logging.Factory, {
      useFactory: instanceCachingFactory((c) => c.resolve(PinoLoggerFactory)),
    });
  }
  if (!container.isRegistered(DI.Ports.RandomEntropy)) {
    container.register<RandomEntropyPort>(DI.Ports.RandomEntropy, { useValue: new NodeRandomEntropy() });
  }
  if (!container.isRegistered(DI.Ports.FileSystem)) {
    container.register<FileSystemPort>(DI.Ports.FileSystem, { useValue: new NodeFileSystem() });
  }
}

async function registerServices(): Promise<void> {
  // Imported lazily so decorated classes load after reflect-metadata.
  const { PreferencesStore } = await import('../infrastructure/preferences/preferences-store.js');
  const { WordlistLoader } = await import('../infrastructure/wordlist/wordlist-loader.js');
  const { OutputWriter } = await import('../infrastructure/output/output-writer.js');
  const { GenerationService } = await import('../application/services/generation-service.js');

  container.register(DI.Infra.PreferencesStore, {
    useFactory: instanceCachingFactory((c) => c.resolve(PreferencesStore)),
  });
  container.register(DI.Infra.WordlistLoader, {
    useFactory: instanceCachingFactory((c) => c.resolve(WordlistLoader)),
  });
  container.register(DI.Infra.OutputWriter, {
    useFactory: instanceCachingFactory((c) => c.resolve(OutputWriter)),
  });
  container.register(DI.Services.Generation, {
    useFactory: instanceCachingFactory((c) => c.resolve(GenerationService)),
  });
}

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Initialize the DI container. Idempotent.
 *
 * @throws ContainerConfigError when the environment does not parse
 */
export async function initializeContainer(options: ContainerInitOptions = {}): Promise<void> {
  if (initialized) return;

  registerRuntime(options);
  registerConfig();
  registerPorts();
  await registerServices();
  initialized = true;
  log.debug({ mode: options.runtimeMode?.kind ?? 'detected' }, 'Container initialized');
}

/**
 * Reset container (for testing).
 */
export function resetContainer(): void {
  container.reset();
  initialized = false;
}

export function isInitialized(): boolean {
  return initialized;
}

export { container };
