/**
 * Opens a Database over an in-process engine, optionally seeded with
 * nodes read from a JSON file.
 */

import * as fs from 'fs';
import {
  Database,
  MemoryEngine,
  ValidationError,
  classify,
  isCanonicNumber,
  type BridgeOptions,
  type Scalar,
  type SetInput,
} from '@mbridge/client';

export interface SessionOptions {
  /**
   * JSON file holding an array of `{ global | local, subscripts?, data }`.
   */
  seed?: string;
  mode?: string;
  release?: string;
  gtm?: boolean;
  debug?: boolean;
}

function toScalar(value: unknown, field: string): Scalar {
  if (typeof value === 'string' || (typeof value === 'number' && Number.isFinite(value))) {
    return value;
  }
  throw ValidationError.invalidType(field, 'a number or a string', value === null ? 'null' : typeof value);
}

function toSeedEntry(value: unknown, index: number): SetInput {
  const field = `seed[${index}]`;
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw ValidationError.invalidType(field, 'an object', Array.isArray(value) ? 'array' : typeof value);
  }
  if (!('data' in value)) {
    throw ValidationError.requiredField('data', field);
  }
  const data = toScalar(value.data, `${field}.data`);
  const rawSubscripts = 'subscripts' in value ? value.subscripts : [];
  if (!Array.isArray(rawSubscripts)) {
    throw ValidationError.invalidType(`${field}.subscripts`, 'an array', typeof rawSubscripts);
  }
  const subscripts = rawSubscripts.map((subscript: unknown, position) =>
    toScalar(subscript, `${field}.subscripts[${position}]`)
  );
  if ('global' in value && typeof value.global === 'string') {
    return { global: value.global, subscripts, data };
  }
  if ('local' in value && typeof value.local === 'string') {
    return { local: value.local, subscripts, data };
  }
  throw ValidationError.requiredField('global', field);
}

/**
 * Parses seed file contents into set calls.
 */
export function parseSeed(text: string): SetInput[] {
  const parsed: unknown = JSON.parse(text);
  if (!Array.isArray(parsed)) {
    throw ValidationError.invalidType('seed', 'an array of nodes', typeof parsed);
  }
  return parsed.map((entry: unknown, index) => toSeedEntry(entry, index));
}

export function loadSeed(file: string): SetInput[] {
  if (!fs.existsSync(file)) {
    throw new Error(`Seed file not found: ${file}`);
  }
  return parseSeed(fs.readFileSync(file, 'utf-8'));
}

function toMode(mode: string | undefined): BridgeOptions['mode'] {
  if (mode === undefined || mode === 'canonical' || mode === 'strict') {
    return mode;
  }
  throw ValidationError.invalidOption('mode', mode, ['canonical', 'strict']);
}

/**
 * Opens a fresh database and applies the seed, if any.
 */
export function openSession(options: SessionOptions = {}, env: NodeJS.ProcessEnv = process.env): Database {
  const engine = new MemoryEngine({
    product: options.gtm ? 'GT.M' : 'YottaDB',
    release: options.release,
  });
  const db = new Database(engine, {}, env);
  db.open({ mode: toMode(options.mode), debug: options.debug });
  for (const entry of options.seed ? loadSeed(options.seed) : []) {
    db.set(entry);
  }
  return db;
}

/**
 * Reads a command-line subscript: canonical numbers of up to 15 characters
 * become numbers, anything else stays a string.
 */
export function parseSubscript(text: string): Scalar {
  return isCanonicNumber(text) && classify(text, 'input') === 'number' ? Number(text) : text;
}
