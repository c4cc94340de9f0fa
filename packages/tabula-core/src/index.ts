/**
 * Tabula - functional combinators for game scripting data
 * Clean, minimal API surface
 */

// ---------- Core Types ----------
export type {
  Sequence,
  Mapping,
  Container,
  Nested,
  Mapper,
  Predicate,
  Reducer,
  Transform,
  AnyResult,
  LogLevel,
  TabulaConfig,
  Event
} from './types';

// ---------- Pipeability ----------
export { makePipeable, pipeable, curryAll } from './pipeable';
export type { Pipeable, Prefix, Drop, Head, Tail } from './pipeable';

// ---------- Container Operations ----------
export * as seq from './sequence';
export * as dict from './mapping';
export { flatten, dropNils, entriesOf, isContainer, tableFromNumbers } from './tables';

// ---------- Composition ----------
export { pipe, compose, sequence, identity, logPipe, tap } from './composition';
export {
  curry,
  curryLast,
  flip,
  unary,
  constant,
  not,
  wrap,
  once,
  OnceGuard,
  maybe,
  alt,
  branch,
  ifThen,
  match,
  createEnum
} from './functional';

// ---------- Copy & Merge ----------
export { deepCopy, assign, joinTables, processRecord, processTable } from './copy';

// ---------- Host Interop ----------
export { toHostMap, fromHostMap, filterToHost, returningHostMap, createHostMap, MemoryHostMap } from './host';
export type { HostMap, HostValue, HostScalar, HostMapFactory } from './host';

// ---------- Numbers, Strings & Time ----------
export * from './numbers';
export * from './strings';
export * from './time';

// ---------- Error Handling ----------
export { safe, attempt } from './safe-functions';

// ---------- Configuration & Logging ----------
export { configure, getConfig, resetConfig, validateConfig, createConfigFromEnv } from './config';
export { logger, shouldLog } from './logger';
export {
  enableLedger,
  disableLedger,
  isLedgerEnabled,
  logEvent,
  getEvents,
  getEventsByName,
  clearEvents,
  getEventStats
} from './ledger';
