/**
 * handoff — run configuration
 *
 * Flags win over environment variables; both are validated by one schema.
 *
 *   --size, -n <N>        HANDOFF_SIZE             source length (default 10)
 *   --policy <name>       HANDOFF_POLICY           mixed | integers | reals
 *   --values <a,b,...>                             explicit source values
 *   --trace               HANDOFF_TRACE            per-item debug records
 *   --hang-timeout <ms>   HANDOFF_HANG_TIMEOUT_MS  report a hang after ms
 *   --show                                         print both sequences
 *   --json                                         print the report as JSON
 */

import { parseArgs } from 'util';
import { z } from 'zod';
import { MAX_ITEMS } from './constants';
import { DEFAULT_SIZE } from './orchestrator';
import { SOURCE_POLICIES } from './source';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const runConfigSchema = z.object({
  size:          z.coerce.number().int().min(0).max(MAX_ITEMS).default(DEFAULT_SIZE),
  policy:        z.enum(SOURCE_POLICIES).default('mixed'),
  values:        z.array(z.coerce.number().finite()).optional(),
  trace:         z.boolean().default(false),
  hangTimeoutMs: z.coerce.number().int().positive().optional(),
  show:          z.boolean().default(false),
  json:          z.boolean().default(false),
  help:          z.boolean().default(false),
});

export type RunConfig = z.infer<typeof runConfigSchema>;

export const USAGE = [
  'Usage: handoff [options]',
  '',
  '  -n, --size <N>          source length (default 10)',
  `      --policy <name>     ${SOURCE_POLICIES.join(' | ')} (default mixed)`,
  '      --values <a,b,...>  explicit source values; overrides size and policy',
  '      --trace             log every item as it crosses the channel',
  '      --hang-timeout <ms> report the run as hung after ms',
  '      --show              print source and destination',
  '      --json              print the run report as JSON',
  '  -h, --help              show this text',
].join('\n');

function envFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  return value === '1' || value.toLowerCase() === 'true';
}

function splitValues(raw: string | undefined): string[] | undefined {
  if (raw === undefined) return undefined;
  return raw.split(',').map(part => part.trim()).filter(part => part.length > 0);
}

function parseFlags(argv: readonly string[]) {
  try {
    return parseArgs({
      args:    [...argv],
      strict:  true,
      options: {
        size:           { type: 'string', short: 'n' },
        policy:         { type: 'string' },
        values:         { type: 'string' },
        trace:          { type: 'boolean' },
        'hang-timeout': { type: 'string' },
        show:           { type: 'boolean' },
        json:           { type: 'boolean' },
        help:           { type: 'boolean', short: 'h' },
      },
    }).values;
  } catch (err) {
    throw new ConfigError(err instanceof Error ? err.message : String(err));
  }
}

/**
 * Parse `argv` (without the node and script entries) and merge `env`.
 *
 * @throws ConfigError on unknown flags, missing flag values or values the
 *                     schema rejects.
 */
export function loadRunConfig(
  argv: readonly string[],
  env:  NodeJS.ProcessEnv = process.env,
): RunConfig {
  const flags = parseFlags(argv);

  const parsed = runConfigSchema.safeParse({
    size:          flags.size ?? env.HANDOFF_SIZE,
    policy:        flags.policy ?? env.HANDOFF_POLICY,
    values:        splitValues(flags.values),
    trace:         flags.trace ?? envFlag(env.HANDOFF_TRACE),
    hangTimeoutMs: flags['hang-timeout'] ?? env.HANDOFF_HANG_TIMEOUT_MS,
    show:          flags.show,
    json:          flags.json,
    help:          flags.help,
  });

  if (!parsed.success) {
    const detail = parsed.error.issues
      .map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${detail}`);
  }
  return parsed.data;
}
