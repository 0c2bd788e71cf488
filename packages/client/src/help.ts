/**
 * Usage text returned by `Database#help`.
 */

const TOPICS: Record<string, string> = {
  open: "open({ mode?, debug?, charset?, autoRelink?, poolSize? }): opens the connection and negotiates engine capabilities",
  close: 'close(): closes the connection; queued asynchronous calls fail and the database cannot be reopened',
  configure: 'configure({ mode?, debug?, charset?, autoRelink?, poolSize? }): changes settings of an open connection',
  version: 'version(): client version, followed by the engine version once open',
  data: "data({ global | local, subscripts? }): { defined: 0 | 1 | 10 | 11 }",
  get: "get({ global | local, subscripts? }): { defined, data }; local may name an intrinsic such as '$ZGBLDIR'",
  set: 'set({ global | local, subscripts?, data }): stores a value',
  kill: 'kill({ global | local, subscripts?, nodeOnly? }): removes a node; without a name removes every local',
  merge: 'merge({ from, to }): copies the tree under from over to',
  order: 'order({ global | local, subscripts? }): { result }, the next sibling subscript',
  previous: 'previous({ global | local, subscripts? }): { result }, the previous sibling subscript',
  nextNode: 'nextNode({ global | local, subscripts? }): { defined, data, subscripts }, the next node holding a value',
  previousNode: 'previousNode({ global | local, subscripts? }): like nextNode, walking backwards',
  increment: 'increment({ global | local, subscripts?, increment? }): { data }, the incremented value',
  lock: 'lock({ global | local, subscripts?, timeout? }): { result: 0 | 1 }; timeout -1 waits forever',
  unlock: 'unlock({ global | local, subscripts? }): releases one lock level; without a name releases every lock',
  function: 'function({ function, arguments?, autoRelink? }): { result }, the value of label^routine(arguments)',
  procedure: 'procedure({ procedure, arguments?, autoRelink? }): calls label^routine(arguments)',
  globalDirectory: 'globalDirectory({ max?, lo?, hi? }): global names',
  localDirectory: 'localDirectory({ max?, lo?, hi? }): local variable names',
};

export function helpText(topic?: string): string {
  if (topic !== undefined && Object.hasOwn(TOPICS, topic)) {
    return TOPICS[topic];
  }
  const lines = Object.keys(TOPICS).map((name) => `  ${name}`);
  const heading = topic === undefined ? 'Available methods:' : `No help for '${topic}'. Available methods:`;
  return [heading, ...lines, "Call help('<method>') for details."].join('\n');
}
