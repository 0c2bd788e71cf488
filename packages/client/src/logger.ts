/**
 * Trace logging gated by the connection's debug level.
 */

import signale from 'signale';
import { debugRank, type DebugLevel } from './config';

const { Signale } = signale;

export type Logger = InstanceType<typeof Signale>;

/**
 * Creates a scoped logger writing to stderr.
 */
export function createLogger(scope: string): Logger {
  return new Signale({ scope, stream: process.stderr });
}

/**
 * Emits trace lines at `low`, `medium` or `high` verbosity; nothing is
 * written while the level is `off`.
 */
export class Tracer {
  constructor(
    private level: DebugLevel,
    private readonly logger: Logger = createLogger('mbridge')
  ) {}

  get debugLevel(): DebugLevel {
    return this.level;
  }

  setLevel(level: DebugLevel): void {
    this.level = level;
  }

  enabled(level: Exclude<DebugLevel, 'off'>): boolean {
    return debugRank(this.level) >= debugRank(level);
  }

  low(message: string): void {
    if (this.enabled('low')) {
      this.logger.debug(message);
    }
  }

  medium(message: string): void {
    if (this.enabled('medium')) {
      this.logger.debug(message);
    }
  }

  high(message: string): void {
    if (this.enabled('high')) {
      this.logger.debug(message);
    }
  }

  /**
   * Warnings are written at every level, `off` included.
   */
  warn(message: string): void {
    this.logger.warn(message);
  }
}
