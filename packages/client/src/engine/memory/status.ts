/**
 * Status codes and messages the MemoryEngine reports, in the engine's
 * `<status>,<location>,%YDB-E-<MNEMONIC>, <text>` error-buffer format.
 */

import { STATUS_INVALID_INTRINSIC } from '../../constants';

export const ENGINE_ERRORS = {
  CTRAP: { status: 150372987, text: 'Character trap $C(3) encountered' },
  GVUNDEF: { status: 150372994, text: 'Global variable undefined' },
  INDRMAXLEN: { status: 150373203, text: 'Maximum length for an indirect argument exceeded' },
  INVSVN: { status: STATUS_INVALID_INTRINSIC, text: 'Invalid special variable name' },
  LABELMISSING: { status: 150373218, text: 'Label referenced but not defined' },
  LOCKWAIT: { status: 150373234, text: 'Lock is held by another process and no timeout was given' },
  LVUNDEF: { status: 150373850, text: 'Undefined local variable' },
  MERGEDESC: { status: 150373930, text: 'Merge operation not possible, destination is a descendant of source' },
  INVCMD: { status: 150373042, text: 'Invalid command keyword encountered' },
  SVNOSET: { status: 150373082, text: 'Cannot SET this special variable' },
  ZLINKFILE: { status: 150374042, text: 'Error while zlinking routine' },
  RTNERROR: { status: 150374322, text: 'Routine signalled an error' },
} as const;

export type EngineErrorName = keyof typeof ENGINE_ERRORS;

/**
 * Failure raised inside the MemoryEngine and turned into a status at the
 * channel boundary.
 */
export class EngineFault extends Error {
  readonly status: number;
  readonly mnemonic: EngineErrorName;

  constructor(mnemonic: EngineErrorName, detail?: string, readonly location = 'call^%mbrEngine') {
    const { status, text } = ENGINE_ERRORS[mnemonic];
    super(detail ? `${text}: ${detail}` : text);
    this.name = 'EngineFault';
    this.status = status;
    this.mnemonic = mnemonic;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Error-buffer text for this fault under the given product prefix.
   */
  format(product: 'YDB' | 'GTM'): string {
    return `${this.status},${this.location},%${product}-E-${this.mnemonic}, ${this.message}`;
  }
}
