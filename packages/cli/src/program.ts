/**
 * Command definitions for the mbridge CLI
 */

import { Command } from 'commander';
import { CLIENT_VERSION } from '@mbridge/client';
import { benchCommand } from './commands/bench.js';
import { dumpCommand } from './commands/dump.js';
import { getCommand, setCommand } from './commands/get.js';
import { methodsCommand, versionCommand } from './commands/version.js';
import { stdout, type Output } from './output.js';
import type { SessionOptions } from './session.js';

function withSessionOptions(command: Command): Command {
  return command
    .option('--seed <file>', 'JSON file of nodes to load before running')
    .option('--mode <mode>', 'Data mode (canonical, strict)')
    .option('--release <release>', 'YottaDB release the engine reports', '1.34')
    .option('--gtm', 'Report the engine as GT.M', false)
    .option('--debug', 'Trace engine calls', false);
}

export function createProgram(output: Output = stdout): Command {
  const program = new Command();

  program
    .name('mbridge')
    .description('Inspect and exercise the mbridge client against an in-process engine')
    .version(CLIENT_VERSION);

  withSessionOptions(
    program.command('version').description('Show the client and engine versions')
  ).action((options: SessionOptions) => versionCommand(options, output));

  program
    .command('methods')
    .description('Describe the Database methods')
    .argument('[method]', 'Method name')
    .action((method: string | undefined) => methodsCommand(method, output));

  withSessionOptions(
    program
      .command('get')
      .description('Read a global node')
      .argument('<global>', 'Global name, with or without ^')
      .argument('[subscripts...]', 'Subscripts; canonical numbers are passed as numbers')
  ).action((global: string, subscripts: string[], options: SessionOptions) =>
    getCommand(global, subscripts, options, output)
  );

  withSessionOptions(
    program
      .command('set')
      .description('Set a global node and print it back')
      .argument('<global>', 'Global name, with or without ^')
      .argument('<args...>', 'Subscripts followed by the value')
  ).action((global: string, args: string[], options: SessionOptions) => setCommand(global, args, options, output));

  withSessionOptions(
    program
      .command('dump')
      .description('Print every node of a global')
      .argument('<global>', 'Global name, with or without ^')
  ).action((global: string, options: SessionOptions) => dumpCommand(global, options, output));

  withSessionOptions(
    program
      .command('bench')
      .description('Time synchronous and callback calls')
      .argument('[count]', 'Calls in each form', '1000')
  ).action((count: string, options: SessionOptions) => benchCommand(count, options, output));

  return program;
}
