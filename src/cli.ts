#!/usr/bin/env node

/**
 * Tracelight demo CLI
 *
 * Runs the demo scenarios against a tracking client and reports how many
 * records were queued, delivered, failed and dropped.
 */

/* eslint-disable no-console */
import * as path from 'path';
import * as fs from 'fs';
import dotenv from 'dotenv';
import pino from 'pino';
import { TrackingClient } from './client/tracking-client';
import { MemoryTransport } from './transport/memory-transport';
import { loadConfig } from './config';
import { ConfigurationError } from './errors';
import { loadDemoScript, runScenarios } from './demo/scenarios';
import { LogLevel, TrackerConfig } from './types/config';

interface CliOptions {
  dryRun: boolean;
  overrides: Partial<TrackerConfig>;
}

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  if (argv.includes('--help') || argv.includes('-h')) {
    showHelp();
    return 0;
  }

  if (argv.includes('--version') || argv.includes('-v')) {
    showVersion();
    return 0;
  }

  dotenv.config();

  let options: CliOptions;
  let config: TrackerConfig;
  try {
    options = parseArgs(argv);
    config = loadConfig(process.env, options.overrides);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`Configuration error: ${error.message}`);
      return 1;
    }
    throw error;
  }

  const logger = pino({ name: 'tracelight-demo', level: config.debug ? 'debug' : config.logLevel });
  const transport = options.dryRun ? new MemoryTransport() : undefined;

  const client = new TrackingClient({
    logger: logger.child({ component: 'client' }),
    transport,
    batchSize: config.batchSize,
    flushInterval: config.flushInterval,
    flushAt: config.flushAt,
    maxQueueSize: config.maxQueueSize,
    maxAttempts: config.maxAttempts,
    retryDelay: config.retryDelay,
    timeout: config.timeout
  });
  client.init({ writeKey: config.writeKey, endpoint: config.endpoint, debug: config.debug });

  const onSignal = () => {
    client.shutdown().then(
      stats => {
        console.log(`\nInterrupted. queued=${stats.queued} delivered=${stats.delivered} failed=${stats.failed}`);
        process.exit(0);
      },
      (error: unknown) => {
        console.error('Shutdown failed:', error instanceof Error ? error.message : String(error));
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  console.log(`Tracking to ${options.dryRun ? 'in-memory collector (dry run)' : config.endpoint}`);
  console.log(`Write key: ${config.writeKey.slice(0, 4)}...\n`);

  const results = await runScenarios({ client, script: loadDemoScript(), logger });

  for (const result of results) {
    console.log(`${result.ok ? 'OK  ' : 'FAIL'} ${result.name}`);
    for (const note of result.notes) {
      console.log(`       ${note}`);
    }
    if (result.error) {
      console.log(`       error: ${result.error}`);
    }
  }

  const stats = await client.shutdown();
  process.off('SIGINT', onSignal);
  process.off('SIGTERM', onSignal);

  console.log('\nDelivery summary');
  console.log(`  queued:    ${stats.queued}`);
  console.log(`  delivered: ${stats.delivered}`);
  console.log(`  failed:    ${stats.failed}`);
  console.log(`  dropped:   ${stats.dropped}`);

  return 0;
}

function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = { dryRun: false, overrides: {} };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--dry-run':
        options.dryRun = true;
        break;
      case '--endpoint':
        options.overrides.endpoint = requireValue(arg, args[++i]);
        break;
      case '--debug':
        options.overrides.debug = true;
        break;
      case '--log-level': {
        const level = requireValue(arg, args[++i]);
        if (!isLogLevel(level)) {
          throw new ConfigurationError(`Unknown log level: ${level}`);
        }
        options.overrides.logLevel = level;
        break;
      }
      default:
        throw new ConfigurationError(`Unknown option: ${arg}`);
    }
  }

  return options;
}

function requireValue(flag: string, value: string | undefined): string {
  if (value === undefined || value.startsWith('--')) {
    throw new ConfigurationError(`${flag} needs a value`);
  }
  return value;
}

function showHelp(): void {
  console.log(`
Tracelight demo - exercises the tracking client end to end

Usage: tracelight-demo [options]

Options:
  --help, -h             Show this help message
  --version, -v          Show version information
  --dry-run              Deliver to an in-memory collector instead of the network
  --endpoint <url>       Collector endpoint
  --debug                Enable debug logs
  --log-level <level>    Log level (debug, info, warn, error, silent)

Environment Variables:
  TRACKER_WRITE_KEY         Write key (required)
  TRACKER_ENDPOINT          Collector endpoint (default http://localhost:3001)
  TRACKER_DEBUG             Enable debug logs
  TRACKER_LOG_LEVEL         Log level
  TRACKER_BATCH_SIZE        Records per request
  TRACKER_FLUSH_INTERVAL    Background flush period in ms (0 disables)
  TRACKER_FLUSH_AT          Queue length that triggers a flush (0 disables)
  TRACKER_MAX_QUEUE_SIZE    Records buffered before new ones are dropped
  TRACKER_MAX_ATTEMPTS      Delivery attempts per record
  TRACKER_RETRY_DELAY       Base retry backoff in ms
  TRACKER_TIMEOUT           Per-attempt timeout in ms

Variables are also read from a .env file in the working directory.
`);
}

function showVersion(): void {
  const candidates = [path.join(__dirname, '../package.json'), path.join(__dirname, '../../package.json')];
  const packagePath = candidates.find(candidate => fs.existsSync(candidate));
  if (!packagePath) {
    console.log('tracelight (unknown version)');
    return;
  }
  const packageJson: { version?: string } = JSON.parse(fs.readFileSync(packagePath, 'utf8'));
  console.log(`tracelight v${packageJson.version ?? 'unknown'}`);
}

if (require.main === module) {
  main().then(
    code => process.exit(code),
    (error: unknown) => {
      console.error('Error:', error instanceof Error ? error.message : String(error));
      process.exit(1);
    }
  );
}

export { main, parseArgs };
