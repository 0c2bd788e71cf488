/**
 * Engine channel bindings
 *
 * The single native call interface the bridge talks to. An implementation
 * may be a foreign-function shim over a real engine or the in-process
 * MemoryEngine; either way it is synchronous and not reentrant.
 */

/**
 * Entry points of the engine-side routine table.
 */
export type EngineEntry =
  | 'data'
  | 'get'
  | 'set'
  | 'kill'
  | 'merge'
  | 'order'
  | 'previous'
  | 'next_node'
  | 'previous_node'
  | 'increment'
  | 'lock'
  | 'unlock'
  | 'function'
  | 'procedure'
  | 'global_directory'
  | 'local_directory'
  | 'version'
  | 'release'
  | 'debug';

/**
 * Fixed-capacity sink the channel writes into. Writes past the capacity
 * throw instead of truncating.
 */
export interface ChannelOutput {
  write(text: string): void;
}

/**
 * Engine channel interface.
 *
 * Argument conventions (every reference travels as its text followed by the
 * packed values of its temporary slots):
 *
 * - `data`, `get`, `order`, `previous`, `next_node`, `previous_node`:
 *   `[reference, slots]`
 * - `set`: `[reference, slots, value]`
 * - `kill`: `[reference, slots, nodeOnly]`, empty reference kills every local
 * - `merge`: `[toReference, toSlots, fromReference, fromSlots]`
 * - `increment`: `[reference, slots, increment]`
 * - `lock`: `[reference, slots, timeoutSeconds]`, `-1` waits forever
 * - `unlock`: `[reference, slots]`, empty reference releases every lock
 * - `function`, `procedure`: `[reference, slots, relink]`
 * - `global_directory`, `local_directory`: `[max, lo, hi]`
 * - `version`, `release`: `[]`
 * - `debug`: `[level]`
 *
 * On success the channel writes a packed string of raw engine values into
 * `result` and returns 0. On failure it writes `<status>,<message>` into
 * `error` and returns the nonzero status.
 */
export interface EngineChannel {
  call(entry: EngineEntry, args: readonly string[], result: ChannelOutput, error: ChannelOutput): number;

  /**
   * Releases engine resources. Called once when the database closes.
   */
  close?(): void;
}

/**
 * Parsed form of an engine error buffer.
 */
export interface EngineFailure {
  status: number;
  message: string;
}

/**
 * Splits an error buffer of the form `<status>,<message>`. The status
 * returned by the call wins over the one in the text when they disagree.
 */
export function parseFailure(status: number, text: string): EngineFailure {
  const comma = text.indexOf(',');
  if (comma < 0) {
    return { status, message: text };
  }
  return { status, message: text.slice(comma + 1) };
}
