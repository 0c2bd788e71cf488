/**
 * Dump command implementation
 */

import signale from 'signale';
import { isCanonicNumber, toStringLiteral, type Database, type Scalar } from '@mbridge/client';
import type { Output } from '../output.js';
import { openSession, type SessionOptions } from '../session.js';

const { Signale } = signale;

function literal(value: Scalar): string {
  const text = String(value);
  return isCanonicNumber(text) ? text : toStringLiteral(text);
}

function reference(global: string, subscripts: readonly Scalar[]): string {
  const name = `^${global.replace(/^\^/, '')}`;
  return subscripts.length === 0 ? name : `${name}(${subscripts.map(literal).join(',')})`;
}

/**
 * Every node of a global in depth-first order, one `^name(subs)=value`
 * line per node. Values are read in strict mode so they print exactly as
 * stored.
 */
export function dumpGlobal(db: Database, global: string): string[] {
  const lines: string[] = [];
  const root = db.get({ global, mode: 'strict' });
  if (root.defined === 1) {
    lines.push(`${reference(global, [])}=${literal(root.data)}`);
  }

  let subscripts: Scalar[] = [];
  for (;;) {
    const next = db.nextNode({ global, subscripts, mode: 'strict' });
    if (next.defined === 0 || !next.subscripts) {
      return lines;
    }
    subscripts = next.subscripts;
    lines.push(`${reference(global, subscripts)}=${literal(next.data ?? '')}`);
  }
}

export async function dumpCommand(global: string, options: SessionOptions, output: Output): Promise<void> {
  const logger = new Signale({ scope: 'dump' });

  try {
    const db = openSession(options);
    const lines = dumpGlobal(db, global);
    lines.forEach((line) => output(line));
    logger.debug(`${lines.length} node(s) in ^${global.replace(/^\^/, '')}`);
    db.close();
  } catch (error) {
    logger.error('Dump failed:', error);
    process.exitCode = 1;
  }
}
