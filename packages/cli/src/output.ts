/**
 * Where commands write their results. Diagnostics go through signale on
 * stderr; results go to an Output so they can be piped or captured.
 */

export type Output = (line: string) => void;

export const stdout: Output = (line) => {
  process.stdout.write(`${line}\n`);
};
