import { inject, singleton } from 'tsyringe';
import type { Result } from 'neverthrow';
import { DI } from '../../di/tokens.js';
import type { RandomEntropyPort } from '../../ports/random-entropy.port.js';
import type { ILoggerFactory, Logger } from '../../core/logging/index.js';
import {
  SecureRandom,
  drawPassphrase,
  drawPassword,
  estimateCharacterEntropy,
  estimatePassphraseEntropy,
  generateMany,
  planPassphrase,
  planPassword,
  type CharacterEntropy,
  type GenerationConfig,
  type GenerationError,
  type PassphraseConfig,
  type PassphraseEntropy,
} from '../../domain/generation/index.js';

export interface GeneratedBatch<E> {
  readonly values: readonly string[];
  readonly entropy: E;
}

/**
 * Entry point for generation: validates once, then draws `count` values from
 * the injected secure source. Logs sizes and outcomes, never the values.
 */
@singleton()
export class GenerationService {
  private readonly logger: Logger;
  private readonly random: SecureRandom;

  constructor(
    @inject(DI.Ports.RandomEntropy) entropy: RandomEntropyPort,
    @inject(DI.Logging.Factory) loggerFactory: ILoggerFactory
  ) {
    this.logger = loggerFactory.create('GenerationService');
    this.random = new SecureRandom(entropy);
  }

  generatePasswords(config: GenerationConfig): Result<GeneratedBatch<CharacterEntropy>, GenerationError> {
    const result = planPassword(config)
      .andThen((plan) => generateMany(() => drawPassword(plan, this.random), config.count))
      .map((values) => ({ values: Array.from(values), entropy: estimateCharacterEntropy(config) }));

    return this.logOutcome('password', result);
  }

  generatePassphrases(config: PassphraseConfig): Result<GeneratedBatch<PassphraseEntropy>, GenerationError> {
    const result = planPassphrase(config)
      .andThen((plan) => generateMany(() => drawPassphrase(plan, this.random), config.count))
      .map((values) => ({ values: Array.from(values), entropy: estimatePassphraseEntropy(config) }));

    return this.logOutcome('passphrase', result);
  }

  estimatePassword(config: GenerationConfig): CharacterEntropy {
    return estimateCharacterEntropy(config);
  }

  estimatePassphrase(config: Pick<PassphraseConfig, 'words' | 'wordCount'>): PassphraseEntropy {
    return estimatePassphraseEntropy(config);
  }

  private logOutcome<E extends { readonly bits: number }>(
    mode: 'password' | 'passphrase',
    result: Result<GeneratedBatch<E>, GenerationError>
  ): Result<GeneratedBatch<E>, GenerationError> {
    if (result.isOk()) {
      this.logger.debug({ mode, count: result.value.values.length, bits: result.value.entropy.bits }, 'Generated batch');
    } else {
      this.logger.warn({ mode, kind: result.error._tag }, result.error.message);
    }
    return result;
  }
}
