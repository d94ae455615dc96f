#!/usr/bin/env node
/**
 * access-reconciler command line.
 *
 *   access-reconciler plan   --desired access.yaml [--domain global ...]
 *   access-reconciler apply  --desired access.yaml
 *   access-reconciler export [--output current.yaml]
 *   access-reconciler serve  [--port 3000]
 *
 * Exit codes: 0 when every domain converged (or plan/export succeeded),
 * 1 when a domain or a grant/revoke failed, 2 on setup failures (bad
 * configuration, unreadable or invalid document, unreachable server).
 */

import { writeFile } from 'fs/promises';
import { ConfigError, ReconcilerError, errorMessage } from './domain/errors';
import { PermissionDomain, parsePermissionDomain } from './domain/permission';
import { ReconcileMode, ReconciliationRun, RunStatus } from './domain/run';
import { ConnectFn, withConnection } from './client/permission-service';
import { connectBambooClient } from './client/bamboo-client';
import { snapshotConnector } from './client/memory-permission-service';
import { readDesiredStateFile } from './desired-state/parser';
import { loadDesiredState, loadDesiredStateFile } from './desired-state/loader';
import { exportDesiredState, fetchCurrentState, renderDesiredState } from './desired-state/exporter';
import { AuditService } from './audit/audit-service';
import { AccessReconciler } from './engine/reconciler';
import { buildReportDocument, writeReportFiles } from './report/diff-report';
import { createFileStore } from './storage/file-store';
import { createApp, createAppContext } from './server';
import {
  ConfigOverrides,
  ReconcilerConfig,
  describeConfig,
  loadConfig,
  requireDesiredStatePath,
  requireServiceConfig,
} from './config';
import { LogHandler, createFileLogHandler, formatEntry, logger, setLogHandler, setLogLevel } from './logger';

export type CliCommand = 'plan' | 'apply' | 'export' | 'serve';

const COMMANDS: readonly CliCommand[] = ['plan', 'apply', 'export', 'serve'];

export interface CliArgs {
  command?: CliCommand;
  help: boolean;
  overrides: ConfigOverrides;
  domains: PermissionDomain[];
  output?: string;
  snapshot?: string;
}

/** Output sinks, replaceable for testing. */
export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
}

const processIO: CliIO = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

export const USAGE = `Usage: access-reconciler <plan|apply|export|serve> [flags]

Flags:
  --bamboo-url <url>         server root (BAMBOO_URL)
  --bamboo-user <name>       basic auth user (BAMBOO_USER)
  --bamboo-password <secret> basic auth password (BAMBOO_PASSWORD)
  --bamboo-token <token>     personal access token (BAMBOO_TOKEN)
  --desired <file>           desired-state YAML (RECONCILER_DESIRED_STATE)
  --report-dir <dir>         where reports are written (RECONCILER_REPORT_DIR)
  --domain <name>            limit to a domain; repeatable
  --snapshot <file>          use a state document instead of a server
  --output <file>            export destination (default: stdout)
  --log-level <level>        debug, info, warn or error (RECONCILER_LOG_LEVEL)
  --log-file <file>          append log lines to a file (RECONCILER_LOG_FILE)
  --actor <id>               actor recorded in the audit trail (RECONCILER_ACTOR)
  --port <port>              serve: listen port (PORT)
`;

const VALUE_FLAGS: Record<string, keyof ConfigOverrides> = {
  '--bamboo-url': 'bambooUrl',
  '--bamboo-user': 'bambooUser',
  '--bamboo-password': 'bambooPassword',
  '--bamboo-token': 'bambooToken',
  '--desired': 'desired',
  '--report-dir': 'reportDir',
  '--log-level': 'logLevel',
  '--log-file': 'logFile',
  '--port': 'port',
  '--actor': 'actor',
};

/** Parse CLI arguments into a structured object. */
export function parseCliArgs(args: string[]): CliArgs {
  const parsed: CliArgs = { help: false, overrides: {}, domains: [] };
  const problems: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--help' || arg === '-h') {
      parsed.help = true;
      continue;
    }
    if (!arg.startsWith('--')) {
      const command = COMMANDS.find((candidate) => candidate === arg);
      if (!command) {
        problems.push(`Unknown command: ${arg}`);
      } else if (parsed.command) {
        problems.push(`Only one command may be given, got ${parsed.command} and ${command}`);
      } else {
        parsed.command = command;
      }
      continue;
    }

    const value = args[i + 1];
    if (value === undefined || value.startsWith('--')) {
      problems.push(`${arg} requires a value`);
      continue;
    }
    i++;

    const overrideKey = VALUE_FLAGS[arg];
    if (overrideKey) {
      parsed.overrides[overrideKey] = value;
      continue;
    }
    switch (arg) {
      case '--domain': {
        const domain = parsePermissionDomain(value);
        if (domain) {
          parsed.domains.push(domain);
        } else {
          problems.push(`Unknown domain: ${value}`);
        }
        break;
      }
      case '--output':
        parsed.output = value;
        break;
      case '--snapshot':
        parsed.snapshot = value;
        break;
      default:
        problems.push(`Unknown flag: ${arg}`);
    }
  }

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }
  return parsed;
}

/** Map a failure to the process exit code. */
export function exitCodeFor(err: unknown): number {
  if (err instanceof ReconcilerError) {
    const code = err.typedError.code;
    if (
      code.startsWith('CONFIG.') ||
      code.startsWith('SCHEMA.') ||
      code.startsWith('VALIDATION.') ||
      code === 'SERVICE.UNREACHABLE'
    ) {
      return 2;
    }
  }
  return 1;
}

function configureLogging(config: ReconcilerConfig, io: CliIO): void {
  setLogLevel(config.logLevel);
  // stdout is reserved for command output
  const toStderr: LogHandler = (entry) => io.stderr(`${formatEntry(entry)}\n`);
  setLogHandler(config.logFile ? createFileLogHandler(config.logFile, toStderr) : toStderr);
}

async function buildConnector(config: ReconcilerConfig, snapshot: string | undefined): Promise<ConnectFn> {
  if (snapshot) {
    return snapshotConnector(loadDesiredState(await readDesiredStateFile(snapshot)));
  }
  const service = requireServiceConfig(config);
  return () => connectBambooClient(service);
}

function formatRun(run: ReconciliationRun): string {
  const lines = run.domains.map((domain) => {
    const result = run.domainResults[domain];
    if (!result) return `${domain}: not run`;
    const { added, removed, unchanged, granted, revoked, failedApplies } = result.counts;
    const applied = run.mode === 'apply' ? ` granted=${granted} revoked=${revoked} failed=${failedApplies}` : '';
    return `${domain}: ${result.status} added=${added} removed=${removed} unchanged=${unchanged}${applied}`;
  });
  return [`${run.mode} ${run.id}: ${run.status}`, ...lines].join('\n') + '\n';
}

async function reconcileCommand(
  mode: ReconcileMode,
  args: CliArgs,
  config: ReconcilerConfig,
  io: CliIO,
): Promise<number> {
  const desiredPath = requireDesiredStatePath(config);
  const desired = await loadDesiredStateFile(desiredPath);
  const connect = await buildConnector(config, args.snapshot);

  const store = createFileStore(config.reportDir);
  const reconciler = new AccessReconciler(store, new AuditService(store));
  const run = await withConnection(connect, (service) =>
    reconciler.run(service, desired, {
      mode,
      domains: args.domains.length > 0 ? args.domains : undefined,
      actorId: config.actorId,
      source: desiredPath,
    }),
  );

  const document = buildReportDocument(run, await store.diffReports.listByRun(run.id));
  const paths = await writeReportFiles(config.reportDir, document);
  logger.info('Reports written', { runId: run.id, paths });

  io.stdout(formatRun(run));
  return run.status === RunStatus.Succeeded ? 0 : 1;
}

async function exportCommand(args: CliArgs, config: ReconcilerConfig, io: CliIO): Promise<number> {
  const connect = await buildConnector(config, args.snapshot);
  const state = await withConnection(connect, fetchCurrentState);
  const text = renderDesiredState(exportDesiredState(state));
  if (args.output) {
    await writeFile(args.output, text, 'utf8');
    logger.info('Current permissions exported', { path: args.output });
  } else {
    io.stdout(text);
  }
  return 0;
}

async function serveCommand(args: CliArgs, config: ReconcilerConfig): Promise<number> {
  const connect = await buildConnector(config, args.snapshot);
  const context = createAppContext({
    connect,
    store: createFileStore(config.reportDir),
    actorId: config.actorId,
  });
  const app = createApp(context);
  await new Promise<void>((resolve, reject) => {
    const server = app.listen(config.port, () => resolve());
    server.on('error', reject);
  });
  logger.info('Reconciler API listening', { port: config.port });
  return 0;
}

/** Run the CLI; resolves to the process exit code. */
export async function runCli(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
  io: CliIO = processIO,
): Promise<number> {
  try {
    const args = parseCliArgs(argv);
    if (args.help) {
      io.stdout(USAGE);
      return 0;
    }
    if (!args.command) {
      io.stderr(USAGE);
      return 2;
    }

    const config = loadConfig(env, args.overrides);
    configureLogging(config, io);
    logger.debug('Configuration loaded', describeConfig(config));

    if (args.command === 'export') {
      return await exportCommand(args, config, io);
    }
    if (args.command === 'serve') {
      return await serveCommand(args, config);
    }
    return await reconcileCommand(args.command, args, config, io);
  } catch (err) {
    io.stderr(`error: ${errorMessage(err)}\n`);
    return exitCodeFor(err);
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      process.stderr.write(`error: ${errorMessage(err)}\n`);
      process.exitCode = 1;
    });
}
