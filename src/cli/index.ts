#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { realpathSync } from 'fs';
import { fileURLToPath } from 'url';
import dotenv from 'dotenv';
import { Auth } from '@/auth/factory';
import { createHttpClient, type HttpClient } from '@/core/client';
import { formatError } from '@/errors/error-handler';
import { isNetworkError } from '@/errors/error-types';
import type { AuthConfig } from '@/interfaces/auth';
import type { ClientConfigInput } from '@/models/config';
import { HttpLogLevel, isHttpMethod, type HttpHeaders } from '@/models/types';
import { InMemoryInspector } from '@/transport/inspector';
import { Logger } from '@/utils/logger';

// Package information
const packageInfo = {
  name: 'crossnet',
  version: '1.0.0',
  description: 'Send HTTP requests with pluggable auth, retries and typed errors'
};

/**
 * Options as commander hands them to the action
 */
export interface CliOptions {
  data?: string;
  header: HttpHeaders;
  bearer?: string;
  basic?: { username: string; password: string };
  baseUrl?: string;
  retries?: number;
  timeout?: number;
  logLevel?: HttpLogLevel;
  inspect: boolean;
  debug: boolean;
}

/**
 * Accumulate a repeatable `-H name:value` option
 */
export function parseHeaderOption(value: string, previous: HttpHeaders = {}): HttpHeaders {
  const separator = value.indexOf(':');
  if (separator <= 0) {
    throw new InvalidArgumentError(`Header must look like "Name: value", got "${value}"`);
  }
  const name = value.slice(0, separator).trim();
  const headerValue = value.slice(separator + 1).trim();
  if (name === '') {
    throw new InvalidArgumentError(`Header name cannot be empty in "${value}"`);
  }
  return { ...previous, [name]: headerValue };
}

/**
 * Split `user:password`; the password may itself contain colons
 */
export function parseBasicOption(value: string): { username: string; password: string } {
  const separator = value.indexOf(':');
  if (separator <= 0) {
    throw new InvalidArgumentError('Basic credentials must look like "user:password"');
  }
  return { username: value.slice(0, separator), password: value.slice(separator + 1) };
}

function parseCountOption(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError(`Expected a non-negative integer, got "${value}"`);
  }
  return parsed;
}

function parseLogLevelOption(value: string): HttpLogLevel {
  const level = Object.values(HttpLogLevel).find((candidate) => candidate === value.toLowerCase());
  if (!level) {
    throw new InvalidArgumentError(`Log level must be one of: ${Object.values(HttpLogLevel).join(', ')}`);
  }
  return level;
}

/**
 * Turn parsed options and the environment into a client configuration.
 * Command-line credentials take precedence over the environment; bearer over basic.
 */
export function buildClientConfig(options: CliOptions, env: NodeJS.ProcessEnv = process.env): ClientConfigInput {
  const baseUrl = options.baseUrl ?? (env.CROSSNET_BASE_URL || undefined);
  const bearer = options.bearer ?? (env.CROSSNET_BEARER_TOKEN || undefined);
  const basic =
    options.basic ??
    (env.CROSSNET_BASIC_USER
      ? { username: env.CROSSNET_BASIC_USER, password: env.CROSSNET_BASIC_PASSWORD ?? '' }
      : undefined);

  let auth: AuthConfig = Auth.none();
  if (bearer) {
    auth = Auth.bearer(bearer);
  } else if (basic) {
    auth = Auth.basic(basic.username, basic.password);
  }

  const config: ClientConfigInput = {
    baseUrl,
    defaultHeaders: options.header,
    auth,
    logging: {
      enabled: options.logLevel !== undefined && options.logLevel !== HttpLogLevel.NONE,
      level: options.logLevel ?? HttpLogLevel.NONE,
    },
  };

  if (options.retries !== undefined) {
    config.retry = { maxRetries: options.retries };
  }
  if (options.timeout !== undefined) {
    config.timeouts = { requestMs: options.timeout };
  }
  return config;
}

/**
 * Request body from `--data`: JSON when it parses, otherwise the raw text
 */
function parseData(data: string | undefined): unknown {
  if (data === undefined) {
    return undefined;
  }
  try {
    const value: unknown = JSON.parse(data);
    return value;
  } catch {
    return data;
  }
}

function printBody(data: unknown): void {
  if (data === undefined) {
    return;
  }
  console.log(typeof data === 'string' ? data : JSON.stringify(data, null, 2));
}

function printExchanges(inspector: InMemoryInspector): void {
  console.log();
  console.log(chalk.bold('Recorded exchanges:'));
  for (const exchange of inspector.getExchanges()) {
    const outcome = exchange.error !== undefined ? chalk.red(exchange.error) : chalk.green(String(exchange.status));
    const duration = exchange.durationMs === undefined ? '' : chalk.gray(` ${exchange.durationMs}ms`);
    console.log(`  ${chalk.cyan(exchange.method)} ${exchange.url} ${outcome}${duration}`);
  }
}

/**
 * Main CLI program setup and execution
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  // Load environment variables from .env file
  dotenv.config();

  const program = new Command();

  program
    .name(packageInfo.name)
    .description(packageInfo.description)
    .version(packageInfo.version, '-v, --version', 'display version number')
    .helpOption('-h, --help', 'display help for command')
    .argument('<method>', 'HTTP method: get, post, put, patch, delete, head or options')
    .argument('<url>', 'absolute URL, or a path resolved against --base-url')
    .option('-d, --data <json>', 'request body; sent as JSON when it parses as JSON')
    .option('-H, --header <name:value>', 'extra request header (repeatable)', parseHeaderOption, {})
    .option('--bearer <token>', 'bearer token (or CROSSNET_BEARER_TOKEN)')
    .option('--basic <user:password>', 'basic credentials (or CROSSNET_BASIC_USER / CROSSNET_BASIC_PASSWORD)', parseBasicOption)
    .option('--base-url <url>', 'base URL for relative paths (or CROSSNET_BASE_URL)')
    .option('--retries <n>', 'retries for server errors and timeouts', parseCountOption)
    .option('--timeout <ms>', 'overall request timeout in milliseconds', parseCountOption)
    .option('--log-level <level>', 'traffic logging: none, info, headers, body or all', parseLogLevelOption)
    .option('--inspect', 'print the recorded exchanges afterwards', false)
    .option('--debug', 'enable debug logging', false);

  program.addHelpText('after', `

${chalk.bold('Examples:')}
  ${chalk.cyan('# Fetch a resource with a bearer token')}
  $ crossnet get https://api.example.com/users/5 --bearer test-token

  ${chalk.cyan('# Post JSON with retries and header logging')}
  $ crossnet post /orders -d '{"sku":"A-1"}' --base-url https://api.example.com --retries 3 --log-level headers
`);

  program.action(async (rawMethod: string, url: string, options: CliOptions) => {
    const debug = options.debug || process.env.DEBUG === 'true';
    const logger = new Logger({ enableDebug: debug, prefix: '[HTTP]' });

    const method = rawMethod.toUpperCase();
    if (!isHttpMethod(method)) {
      return program.error(`Unsupported method: ${rawMethod}`);
    }

    const inspector = options.inspect ? new InMemoryInspector() : undefined;
    const controller = new AbortController();
    const onInterrupt = () => controller.abort();
    process.once('SIGINT', onInterrupt);

    let client: HttpClient | undefined;
    try {
      client = createHttpClient(buildClientConfig(options), { inspector, logger });
      const response = await client.request(method, url, {
        body: parseData(options.data),
        signal: controller.signal,
      });
      logger.debug(`${response.status} ${response.statusText} after ${response.attempts} attempt(s)`);
      printBody(response.data);
    } catch (error) {
      logger.error(formatError(error), error instanceof Error && !isNetworkError(error) ? error : undefined);
      process.exitCode = 1;
    } finally {
      process.off('SIGINT', onInterrupt);
      await client?.close();
    }

    if (inspector) {
      printExchanges(inspector);
    }
  });

  await program.parseAsync(argv);
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    return realpathSync(entry) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main().catch((error: unknown) => {
    console.error(chalk.red(formatError(error)));
    process.exit(1);
  });
}
