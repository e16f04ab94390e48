/**
 * Dependency Injection Token Registry
 *
 * Single source of truth for all DI tokens, grouped by layer.
 *
 * ADDING A NEW SERVICE:
 * 1. Add a token here under the matching namespace
 * 2. Decorate the class with @singleton() and @inject() every constructor parameter
 * 3. Register the token in container.ts
 */
export const DI = {
  Config: {
    /** Validated environment configuration */
    App: Symbol('Config.App'),
  },

  Runtime: {
    Mode: Symbol('Runtime.Mode'),
    ProcessTerminator: Symbol('Runtime.ProcessTerminator'),
  },

  Logging: {
    Factory: Symbol('Logging.Factory'),
  },

  Ports: {
    /** CSPRNG byte source */
    RandomEntropy: Symbol('Ports.RandomEntropy'),
    FileSystem: Symbol('Ports.FileSystem'),
  },

  Infra: {
    PreferencesStore: Symbol('Infra.PreferencesStore'),
    WordlistLoader: Symbol('Infra.WordlistLoader'),
    OutputWriter: Symbol('Infra.OutputWriter'),
  },

  Services: {
    Generation: Symbol('Services.Generation'),
  },
} as const;
