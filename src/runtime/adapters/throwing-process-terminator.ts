import type { ExitCode, ProcessTerminator } from '../ports/process-terminator.js';

/**
 * Test adapter: throws instead of exiting, so an unexpected exit fails the test
 * rather than killing the runner.
 */
export class ThrowingProcessTerminator implements ProcessTerminator {
  terminate(code: ExitCode): never {
    throw new ProcessTerminationError(code);
  }
}

export class ProcessTerminationError extends Error {
  constructor(readonly code: ExitCode) {
    super(`[ProcessTerminator] terminate(${code.kind})`);
    this.name = 'ProcessTerminationError';
  }
}
