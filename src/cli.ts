#!/usr/bin/env node
/**
 * handoff — command line entry point
 *
 * Exit codes: 0 transferred and validated, 1 validation failure or unit
 * fault, 2 invalid configuration, 3 hung pipeline with no faulted unit
 * (needs --hang-timeout).
 */

import { ConfigError, loadRunConfig, USAGE, type RunConfig } from './config';
import { createConsoleLogger } from './logger';
import { HungPipelineError, runPipeline, type RunReport } from './orchestrator';

export const EXIT_OK       = 0;
export const EXIT_FAILED   = 1;
export const EXIT_CONFIG   = 2;
export const EXIT_HUNG     = 3;

export interface CliIO {
  readonly out: (line: string) => void;
  readonly err: (line: string) => void;
}

const consoleIO: CliIO = {
  out: line => console.log(line),
  err: line => console.error(line),
};

function formatSequence(values: ReadonlyArray<number | undefined>): string {
  return `[${values.map(v => (v === undefined ? '_' : String(v))).join(', ')}]`;
}

function summarize(report: RunReport): Record<string, unknown> {
  return {
    passed:      report.passed,
    size:        report.size,
    capacity:    report.capacity,
    elapsedMs:   Number(report.elapsedMs.toFixed(3)),
    hung:        report.hung,
    mismatches:  report.mismatches,
    producer:    report.producer,
    consumer:    report.consumer,
    channel:     report.channel,
    failure:     report.failure && { name: report.failure.name, message: report.failure.message },
    source:      report.source,
    destination: report.destination.map(v => (v === undefined ? null : v)),
  };
}

export async function runCli(
  argv: readonly string[],
  env:  NodeJS.ProcessEnv = process.env,
  io:   CliIO             = consoleIO,
): Promise<number> {
  let config: RunConfig;
  try {
    config = loadRunConfig(argv, env);
  } catch (err) {
    if (err instanceof ConfigError) {
      io.err(err.message);
      io.err(USAGE);
      return EXIT_CONFIG;
    }
    throw err;
  }

  if (config.help) {
    io.out(USAGE);
    return EXIT_OK;
  }

  const report = await runPipeline({
    size:          config.size,
    source:        config.values,
    policy:        config.policy,
    trace:         config.trace,
    hangTimeoutMs: config.hangTimeoutMs,
    // JSON output owns stdout; keep log lines off it.
    logger:        config.json ? undefined : createConsoleLogger(config.trace ? 'debug' : 'info'),
  });

  if (config.json) {
    io.out(JSON.stringify(summarize(report)));
  } else {
    if (config.show) {
      io.out(`source:      ${formatSequence(report.source)}`);
      io.out(`destination: ${formatSequence(report.destination)}`);
    }
    io.out(`${report.passed ? 'PASS' : 'FAIL'} n=${report.size} capacity=${report.capacity} ` +
      `elapsed=${(report.elapsedMs / 1000).toFixed(4)}s`);
    if (report.failure) io.err(report.failure.message);
  }

  if (report.passed) return EXIT_OK;
  return report.failure instanceof HungPipelineError ? EXIT_HUNG : EXIT_FAILED;
}

if (require.main === module) {
  runCli(process.argv.slice(2)).then(
    code => { process.exitCode = code; },
    (err: unknown) => {
      console.error(err);
      process.exitCode = EXIT_FAILED;
    },
  );
}
