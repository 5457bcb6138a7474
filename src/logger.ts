/**
 * handoff — observability hook
 *
 * Everything the pipeline reports goes through a PipelineLogger passed in by
 * the caller. Nothing here is process-wide: a run without a logger is silent.
 */

export type LogLevel  = 'debug' | 'info' | 'warn' | 'error';
export type LogFields = Readonly<Record<string, string | number | boolean>>;

export interface PipelineLogger {
  debug(message: string, fields?: LogFields): void;
  info(message: string,  fields?: LogFields): void;
  warn(message: string,  fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info:  1,
  warn:  2,
  error: 3,
};

export const silentLogger: PipelineLogger = {
  debug: () => {},
  info:  () => {},
  warn:  () => {},
  error: () => {},
};

/** `HH:MM:SS` in local time. */
function clock(now: Date): string {
  return [now.getHours(), now.getMinutes(), now.getSeconds()]
    .map(n => String(n).padStart(2, '0'))
    .join(':');
}

export function formatLine(
  level:   LogLevel,
  message: string,
  fields:  LogFields | undefined,
  now:     Date,
): string {
  const unit  = fields?.unit;
  const rest  = Object.entries(fields ?? {}).filter(([key]) => key !== 'unit');
  const tail  = rest.length > 0 ? ' ' + rest.map(([k, v]) => `${k}=${v}`).join(' ') : '';
  const scope = unit === undefined ? '' : ` [${unit}]`;
  return `${clock(now)} ${level.toUpperCase()}${scope} ${message}${tail}`;
}

/**
 * Logger that writes one formatted line per record through console.
 * Records below `minLevel` are dropped.
 */
export function createConsoleLogger(minLevel: LogLevel = 'info'): PipelineLogger {
  const emit = (level: LogLevel, message: string, fields?: LogFields): void => {
    if (LEVEL_RANK[level] < LEVEL_RANK[minLevel]) return;
    const line = formatLine(level, message, fields, new Date());
    if (level === 'error')     console.error(line);
    else if (level === 'warn') console.warn(line);
    else                       console.log(line);
  };
  return {
    debug: (message, fields) => emit('debug', message, fields),
    info:  (message, fields) => emit('info',  message, fields),
    warn:  (message, fields) => emit('warn',  message, fields),
    error: (message, fields) => emit('error', message, fields),
  };
}

/** Forward every record to `sink`, with `fields` merged under the record's own. */
export function withFields(sink: PipelineLogger, fields: LogFields): PipelineLogger {
  return {
    debug: (message, extra) => sink.debug(message, { ...fields, ...extra }),
    info:  (message, extra) => sink.info(message,  { ...fields, ...extra }),
    warn:  (message, extra) => sink.warn(message,  { ...fields, ...extra }),
    error: (message, extra) => sink.error(message, { ...fields, ...extra }),
  };
}

/** Dispatch one record to the method named by `level`. */
export function logAt(
  logger:  PipelineLogger,
  level:   LogLevel,
  message: string,
  fields?: LogFields,
): void {
  switch (level) {
    case 'debug': logger.debug(message, fields); break;
    case 'info':  logger.info(message, fields);  break;
    case 'warn':  logger.warn(message, fields);  break;
    case 'error': logger.error(message, fields); break;
  }
}
