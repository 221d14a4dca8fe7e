import { Command, InvalidArgumentError } from 'commander';
import {
  connectSshSession,
  createLogger,
  loadIngestConfig,
  runIngestion,
  type IngestConfig,
  type Logger,
  type SessionConnector,
  type SleepFunction
} from '@fiberwatch/optical-ingest';
import { buildReport, formatReport, writeRowsFile } from '../lib/report';

export const DEFAULT_PASSWORD_ENV = 'OPTICAL_SSH_PASSWORD';

export type IngestCommandDependencies = {
  env?: Record<string, string | undefined>;
  connectorFactory?: (config: IngestConfig) => SessionConnector;
  loggerFactory?: (level: string) => Logger;
  sleep?: SleepFunction;
};

type IngestCommandOptions = {
  host?: string;
  port?: number;
  user?: string;
  directory?: string;
  passwordEnv?: string;
  delayMs?: number;
  maxFiles?: number;
  timeoutMs?: number;
  logLevel?: string;
  json?: boolean;
  rows?: string;
};

function parseNonNegativeInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

const defaultConnectorFactory = (config: IngestConfig): SessionConnector => () =>
  connectSshSession({
    host: config.host,
    port: config.port,
    username: config.username,
    password: config.password,
    timeoutMs: config.connectTimeoutMs
  });

function resolvePassword(env: Record<string, string | undefined>, options: IngestCommandOptions): string | undefined {
  const variable = options.passwordEnv ?? DEFAULT_PASSWORD_ENV;
  const value = env[variable];
  if (options.passwordEnv && value === undefined) {
    throw new Error(`Environment variable ${variable} is not set`);
  }
  return value;
}

export function registerIngestCommand(program: Command, dependencies: IngestCommandDependencies = {}): void {
  program
    .command('ingest')
    .description('Fetch every snapshot file from the remote directory and build the lab model')
    .option('--host <host>', 'Remote host to connect to')
    .option('--port <port>', 'SSH port', parseNonNegativeInteger)
    .option('--user <username>', 'Account used for the SSH session')
    .option('--directory <path>', 'Remote directory holding the snapshot files')
    .option('--password-env <name>', `Environment variable holding the password (default ${DEFAULT_PASSWORD_ENV})`)
    .option('--delay-ms <ms>', 'Delay before each file fetch', parseNonNegativeInteger)
    .option('--max-files <count>', 'Maximum number of files to process', parseNonNegativeInteger)
    .option('--timeout-ms <ms>', 'Connection timeout', parseNonNegativeInteger)
    .option('--log-level <level>', 'pino log level')
    .option('--json', 'Print the report as JSON')
    .option('--rows <file>', 'Write flattened measurement rows as newline-delimited JSON')
    .action(async (options: IngestCommandOptions) => {
      const env = dependencies.env ?? process.env;
      const config = loadIngestConfig(env, {
        host: options.host,
        port: options.port,
        username: options.user,
        password: resolvePassword(env, options),
        directory: options.directory,
        fetchDelayMs: options.delayMs,
        maxFiles: options.maxFiles,
        connectTimeoutMs: options.timeoutMs,
        logLevel: options.logLevel
      });
      const logger = (dependencies.loggerFactory ?? createLogger)(config.logLevel);
      const connectorFactory = dependencies.connectorFactory ?? defaultConnectorFactory;

      logger.info(
        { host: config.host, port: config.port, username: config.username, directory: config.directory },
        'Starting optical telemetry ingestion'
      );
      const result = await runIngestion({
        connector: connectorFactory(config),
        directory: config.directory,
        fetchDelayMs: config.fetchDelayMs,
        maxFiles: config.maxFiles,
        sleep: dependencies.sleep,
        logger
      });

      if (options.rows) {
        const written = await writeRowsFile(options.rows, result.model);
        logger.info({ file: options.rows, rows: written }, 'Wrote measurement rows');
      }

      const report = buildReport(result);
      if (options.json) {
        console.log(JSON.stringify(report, null, 2));
        return;
      }
      for (const line of formatReport(report)) {
        console.log(line);
      }
    });
}
