/**
 * Get and set command implementations
 */

import signale from 'signale';
import type { Output } from '../output.js';
import { openSession, parseSubscript, type SessionOptions } from '../session.js';

const { Signale } = signale;

export async function getCommand(
  global: string,
  subscripts: string[],
  options: SessionOptions,
  output: Output
): Promise<void> {
  const logger = new Signale({ scope: 'get' });

  try {
    const db = openSession(options);
    const result = db.get({ global, subscripts: subscripts.map(parseSubscript) });
    output(JSON.stringify(result));
    db.close();
  } catch (error) {
    logger.error('Get failed:', error);
    process.exitCode = 1;
  }
}

/**
 * Sets a node on a seeded session and prints the node's new state. The
 * engine lives in this process, so the change ends with the command.
 */
export async function setCommand(
  global: string,
  args: string[],
  options: SessionOptions,
  output: Output
): Promise<void> {
  const logger = new Signale({ scope: 'set' });

  try {
    if (args.length === 0) {
      throw new Error('Missing value: mbridge set <global> [subscripts...] <value>');
    }
    const db = openSession(options);
    const node = { global, subscripts: args.slice(0, -1).map(parseSubscript) };
    db.set({ ...node, data: parseSubscript(args[args.length - 1]) });
    output(JSON.stringify(db.get(node)));
    db.close();
  } catch (error) {
    logger.error('Set failed:', error);
    process.exitCode = 1;
  }
}
