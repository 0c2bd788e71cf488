/**
 * Version and method help commands
 */

import type { Output } from '../output.js';
import { openSession, type SessionOptions } from '../session.js';

export async function versionCommand(options: SessionOptions, output: Output): Promise<void> {
  const db = openSession(options);
  output(db.version());
  db.close();
}

export async function methodsCommand(name: string | undefined, output: Output): Promise<void> {
  const db = openSession();
  db.help(name).split('\n').forEach((line) => output(line));
  db.close();
}
