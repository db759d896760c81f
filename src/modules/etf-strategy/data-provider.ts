/**
 * ETF STRATEGY — Data Provider
 *
 * fetchSignal(signalClass, instrument, mode) walks the source chain of the
 * class in fixed order. The first source that returns a finite number wins.
 *
 * Exhausted chain:
 *   STRICT  → DataUnavailableError
 *   LENIENT → conservative substitute, isEstimated = true
 */

import { DataUnavailableError, errorMessage, type FailedSignal } from '../../common/errors.js';
import { createConsoleLogger, type Logger } from '../../common/logger.js';
import { classifyTransportError } from '../network/index.js';
import type { DataMode, SignalClass, SignalQuote } from './etf.types.js';
import type { SourceRegistry } from './sources/source.registry.js';
import type { SignalFetchContext } from './sources/source.types.js';
import type { InstrumentConfig } from './strategy.config.js';

// ═══════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════

export const LENIENT_SUBSTITUTES: Readonly<Record<SignalClass, number>> = Object.freeze({
  index: 0.0,
  futures: 0.0,
  premium: 1.5,
});

export function signalSymbol(signalClass: SignalClass, instrument: InstrumentConfig): string {
  switch (signalClass) {
    case 'index':
      return instrument.index.yahoo;
    case 'futures':
      return instrument.futures.yahoo;
    case 'premium':
      return instrument.fund.code;
  }
}

export interface DataProviderOptions {
  registry: SourceRegistry;
  logger?: Logger;
  clock?: () => Date;
}

// ═══════════════════════════════════════════════════════════════
// PROVIDER
// ═══════════════════════════════════════════════════════════════

export class DataProvider {
  private readonly registry: SourceRegistry;
  private readonly logger: Logger;
  private readonly clock: () => Date;

  constructor(options: DataProviderOptions) {
    this.registry = options.registry;
    this.logger = options.logger ?? createConsoleLogger('EtfData');
    this.clock = options.clock ?? (() => new Date());
  }

  async fetchSignal(
    signalClass: SignalClass,
    instrument: InstrumentConfig,
    mode: DataMode,
  ): Promise<SignalQuote> {
    const symbol = signalSymbol(signalClass, instrument);
    const ctx: SignalFetchContext = {
      signalClass,
      instrument,
      now: this.clock(),
      observations: {},
    };
    const attempts: string[] = [];

    for (const source of this.registry.chainFor(signalClass)) {
      try {
        const reading = await source.fetch(ctx);
        if (!Number.isFinite(reading.value)) {
          throw new Error(`non-finite value ${reading.value}`);
        }

        this.registry.recordSuccess(source.id);
        if (reading.estimated) {
          this.logger.info(
            { signalClass, symbol, source: source.id, value: reading.value },
            'Using estimated value',
          );
        }

        return {
          signalClass,
          symbol,
          value: reading.value,
          isEstimated: reading.estimated,
          source: source.id,
        };
      } catch (err) {
        const reason = classifyTransportError(err);
        const message = errorMessage(err);
        attempts.push(`${source.id}: ${reason}`);
        this.registry.recordError(source.id, `${reason} ${message}`);
        this.logger.warn(
          { signalClass, symbol, source: source.id, reason, err: message },
          'Source attempt failed',
        );
      }
    }

    const failure: FailedSignal = { signalClass, symbol, attempts };

    if (mode === 'STRICT') {
      this.logger.error({ ...failure }, 'Source chain exhausted');
      throw new DataUnavailableError([failure]);
    }

    const value = LENIENT_SUBSTITUTES[signalClass];
    this.logger.warn({ ...failure, substitute: value }, 'Source chain exhausted, substituting');

    return {
      signalClass,
      symbol,
      value,
      isEstimated: true,
      source: 'SUBSTITUTE',
    };
  }
}
