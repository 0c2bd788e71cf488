/**
 * Bench command implementation
 *
 * Times a batch of set/get pairs through the synchronous form, then the
 * same batch through the callback form, against the in-process engine.
 */

import { performance } from 'perf_hooks';
import signale from 'signale';
import type { Database } from '@mbridge/client';
import type { Output } from '../output.js';
import { openSession, type SessionOptions } from '../session.js';

const { Signale } = signale;

export interface BenchReport {
  count: number;
  syncMs: number;
  asyncMs: number;
}

function callbackSet(db: Database, key: number): Promise<void> {
  return new Promise((resolve, reject) => {
    db.set({ global: 'mbench', subscripts: ['async', key], data: key }, (error) => (error ? reject(error) : resolve()));
  });
}

/**
 * Runs `count` synchronous and `count` asynchronous sets, reading each
 * synchronous one back.
 */
export async function runBench(db: Database, count: number): Promise<BenchReport> {
  const syncStart = performance.now();
  for (let key = 1; key <= count; key += 1) {
    db.set({ global: 'mbench', subscripts: ['sync', key], data: key });
    const { data } = db.get({ global: 'mbench', subscripts: ['sync', key] });
    if (data !== key) {
      throw new Error(`Read back ${String(data)} for ^mbench("sync",${key})`);
    }
  }
  const syncMs = performance.now() - syncStart;

  const asyncStart = performance.now();
  const pending: Promise<void>[] = [];
  for (let key = 1; key <= count; key += 1) {
    pending.push(callbackSet(db, key));
  }
  await Promise.all(pending);
  const asyncMs = performance.now() - asyncStart;

  return { count, syncMs, asyncMs };
}

function rate(count: number, ms: number): string {
  return ms > 0 ? `${Math.round((count * 1000) / ms)} calls/s` : 'n/a';
}

export async function benchCommand(count: string, options: SessionOptions, output: Output): Promise<void> {
  const logger = new Signale({ scope: 'bench' });

  try {
    const calls = Number(count);
    if (!Number.isInteger(calls) || calls < 1) {
      throw new Error(`Count must be a positive integer, got ${count}`);
    }
    const db = openSession(options);
    logger.await(`Running ${calls} call(s) in each form...`);
    const report = await runBench(db, calls);
    db.close();
    output(`sync:  ${calls} set+get in ${report.syncMs.toFixed(1)} ms (${rate(calls * 2, report.syncMs)})`);
    output(`async: ${calls} set in ${report.asyncMs.toFixed(1)} ms (${rate(calls, report.asyncMs)})`);
    logger.success('Bench complete');
  } catch (error) {
    logger.error('Bench failed:', error);
    process.exitCode = 1;
  }
}
