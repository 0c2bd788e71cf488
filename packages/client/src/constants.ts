/**
 * Client Constants
 *
 * Capacity ceilings, wire-format characters and engine limits used by the
 * codec, the packer and the dispatcher.
 */

/**
 * Longest token (in characters) that may still be treated as a number.
 * The engine keeps ~18 significant digits while the host keeps ~16, so longer
 * numeric-looking tokens travel as strings.
 */
export const MAX_NUMERIC_TOKEN_LENGTH = 15;

/**
 * Delimiter written between a length prefix and its token in a packed string.
 */
export const PACK_DELIMITER = ':';

/**
 * Maximum length of a literal string handed to the engine's indirection
 * mechanism.
 */
export const INDIRECTION_LIMIT = 8192;

/**
 * Indirection limit for function calls, which are wrapped in an assignment
 * of the return value before evaluation.
 */
export const FUNCTION_INDIRECTION_LIMIT = 8180;

/**
 * Name of the temporary local array used when a reference must be rebuilt
 * from slot placeholders.
 */
export const TEMP_ARGS_NAME = '%mbrArgs';

/**
 * Prefix reserved for names the bridge itself places in the engine's local
 * symbol table. User locals may not start with it.
 */
export const RESERVED_PREFIX = '%mbr';

/**
 * Capacity of a descriptor's error buffer, in bytes.
 */
export const ERROR_BUFFER_CAPACITY = 2048;

/**
 * Capacity of a descriptor's input buffer, in bytes (1 MiB): the ceiling on
 * one request's encoded arguments.
 */
export const INPUT_BUFFER_CAPACITY = 1048576;

/**
 * Capacity of a descriptor's result buffer, in bytes (1 MiB).
 */
export const RESULT_BUFFER_CAPACITY = 1048576;

/**
 * Longest name (after the optional `^`) the engine distinguishes.
 */
export const MAX_NAME_LENGTH = 31;

/**
 * Engine status raised when an intrinsic special variable is unknown.
 * Older engines report it when asked for their release.
 */
export const STATUS_INVALID_INTRINSIC = 150373074;

/**
 * Mnemonic carried in the message of a call the engine trapped an interrupt in.
 */
export const INTERRUPT_MNEMONIC = 'CTRAP';

/**
 * Number of worker lanes draining the asynchronous queue.
 */
export const DEFAULT_POOL_SIZE = 4;

/**
 * First engine release whose `$query` accepts a direction argument.
 */
export const REVERSE_QUERY_RELEASE = '1.10';

/**
 * Version of this client, reported by `version()`.
 */
export const CLIENT_VERSION = '0.1.0';

/**
 * Name the client reports itself under.
 */
export const CLIENT_NAME = 'mbridge';

/**
 * Message attached to synthesized results for unsupported reverse iteration.
 */
export const PREVIOUS_NODE_UNSUPPORTED = 'previous_node not yet implemented';
