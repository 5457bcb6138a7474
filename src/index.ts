// ─── Types ────────────────────────────────────────────────────────────────────
export type {
  Item,
  EndOfStream,
  ChannelElement,
  SourcePolicy,
  UnitName,
  UnitState,
  ProducerReport,
  ConsumerReport,
  ChannelStats,
} from './types';

export { END_OF_STREAM, item } from './types';

// ─── Constants ────────────────────────────────────────────────────────────────
export {
  CHANNEL_MAGIC,
  CHANNEL_VERSION,
  HEADER_SIZE,
  SLOT_SIZE,
  TAG_ITEM,
  TAG_END,
  MAX_ITEMS,
  computeChannelBytes,
} from './constants';

// ─── Channel ──────────────────────────────────────────────────────────────────
export { BoundedChannel, ChannelFault } from './channel';
export type { ChannelOptions } from './channel';

// ─── Destination & source ─────────────────────────────────────────────────────
export { DestinationBuffer } from './destination';
export { buildSource, SOURCE_POLICIES } from './source';

// ─── Units ────────────────────────────────────────────────────────────────────
export { produce } from './producer';
export type { UnitOptions } from './producer';
export { consume } from './consumer';

// ─── Logging ──────────────────────────────────────────────────────────────────
export {
  createConsoleLogger,
  silentLogger,
  withFields,
  formatLine,
  logAt,
} from './logger';
export type { PipelineLogger, LogLevel, LogFields } from './logger';

// ─── Orchestrator ─────────────────────────────────────────────────────────────
export {
  runPipeline,
  assertTransferred,
  channelCapacity,
  findMismatches,
  DEFAULT_SIZE,
  ValidationFailure,
  UnitFaultError,
  HungPipelineError,
} from './orchestrator';
export type { RunOptions, RunReport, FaultPlan } from './orchestrator';

// ─── Configuration ────────────────────────────────────────────────────────────
export { loadRunConfig, ConfigError } from './config';
export type { RunConfig } from './config';
