import { mkdtemp, readFile, readdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import YAML from 'yaml';
import { CliIO, USAGE, exitCodeFor, parseCliArgs, runCli } from '../src/cli';
import { ConfigError, FetchError, SchemaError, ServiceConnectionError } from '../src/domain/errors';
import { PermissionDomain } from '../src/domain/permission';
import { LogLevel, setLogHandler, setLogLevel } from '../src/logger';
import { REPORT_FILES } from '../src/report/diff-report';
import { FULL_DOCUMENT } from './fixtures';

const SNAPSHOT = `
global_permissions:
  - group: bamboo-admins
    permissions: [ADMINISTER]
  - user: jdoe
    permissions: [VIEW]
  - user: leaver
    permissions: [VIEW]
build_plan_permissions:
project_permissions:
deployment_permissions:
deployment_project_permissions:
deployment_environment_permissions:
`;

function capture(): { io: CliIO; stdout: () => string; stderr: () => string } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    io: {
      stdout: (text) => {
        out.push(text);
      },
      stderr: (text) => {
        err.push(text);
      },
    },
    stdout: () => out.join(''),
    stderr: () => err.join(''),
  };
}

function lastLine(text: string): string {
  const lines = text.trimEnd().split('\n');
  return lines[lines.length - 1];
}

describe('parseCliArgs', () => {
  test('collects the command, overrides and repeated domains', () => {
    const args = parseCliArgs([
      'plan',
      '--desired',
      'access.yaml',
      '--domain',
      'global',
      '--domain',
      'build-plan',
      '--bamboo-url',
      'https://bamboo.example.test',
    ]);
    expect(args).toEqual({
      command: 'plan',
      help: false,
      overrides: { desired: 'access.yaml', bambooUrl: 'https://bamboo.example.test' },
      domains: [PermissionDomain.Global, PermissionDomain.BuildPlan],
    });
  });

  test('reports every problem at once', () => {
    let problems: string[] = [];
    try {
      parseCliArgs(['plan', 'apply', '--force', 'yes', '--domain', 'builds', '--desired']);
    } catch (err) {
      if (err instanceof ConfigError) problems = err.problems;
    }
    expect(problems).toEqual([
      'Only one command may be given, got plan and apply',
      'Unknown flag: --force',
      'Unknown domain: builds',
      '--desired requires a value',
    ]);
  });

  test('recognizes help', () => {
    expect(parseCliArgs(['-h']).help).toBe(true);
  });
});

describe('exitCodeFor', () => {
  test('setup failures exit with 2 and everything else with 1', () => {
    expect(exitCodeFor(new ConfigError(['x']))).toBe(2);
    expect(exitCodeFor(new SchemaError([{ path: '$', message: 'x' }]))).toBe(2);
    expect(exitCodeFor(new ServiceConnectionError('https://bamboo.example.test', 'down'))).toBe(2);
    expect(exitCodeFor(new FetchError('global', 'down'))).toBe(1);
    expect(exitCodeFor(new Error('boom'))).toBe(1);
  });
});

describe('runCli', () => {
  let dir: string;
  let desiredPath: string;
  let snapshotPath: string;
  let reportDir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'cli-'));
    desiredPath = join(dir, 'access.yaml');
    snapshotPath = join(dir, 'snapshot.yaml');
    reportDir = join(dir, 'reports');
    await writeFile(desiredPath, FULL_DOCUMENT, 'utf8');
    await writeFile(snapshotPath, SNAPSHOT, 'utf8');
  });

  afterEach(async () => {
    setLogLevel(LogLevel.Info);
    setLogHandler(() => undefined);
    await rm(dir, { recursive: true, force: true });
  });

  test('--help prints usage', async () => {
    const out = capture();
    expect(await runCli(['--help'], {}, out.io)).toBe(0);
    expect(out.stdout()).toBe(USAGE);
  });

  test('no command prints usage to stderr', async () => {
    const out = capture();
    expect(await runCli([], {}, out.io)).toBe(2);
    expect(out.stderr()).toBe(USAGE);
  });

  test('bad arguments exit with 2', async () => {
    const out = capture();
    expect(await runCli(['plan', '--force', 'yes'], {}, out.io)).toBe(2);
    expect(out.stderr()).toBe('error: Invalid configuration: Unknown flag: --force\n');
  });

  test('plan prints per-domain counts and writes reports', async () => {
    const out = capture();
    const code = await runCli(
      ['plan', '--desired', desiredPath, '--snapshot', snapshotPath, '--report-dir', reportDir],
      {},
      out.io,
    );

    expect(code).toBe(0);
    const lines = out.stdout().trimEnd().split('\n');
    expect(lines[0]).toMatch(/^plan rec_[0-9a-f-]+: succeeded$/);
    expect(lines.slice(1)).toEqual([
      'global: succeeded added=1 removed=1 unchanged=2',
      'build-plan: succeeded added=3 removed=0 unchanged=0',
      'project: succeeded added=1 removed=0 unchanged=0',
      'deployment: succeeded added=1 removed=0 unchanged=0',
      'deployment-project: succeeded added=1 removed=0 unchanged=0',
      'deployment-environment: succeeded added=1 removed=0 unchanged=0',
    ]);

    const removed = YAML.parse(await readFile(join(reportDir, REPORT_FILES.removed), 'utf8'));
    expect(removed.global_permissions_diff).toEqual([
      { change: 'removed', subjectName: 'leaver', subjectGroup: null, permission: 'VIEW', value: true },
    ]);

    const runId = lines[0].split(' ')[1].replace(/:$/, '');
    expect((await readdir(join(reportDir, runId))).sort()).toEqual([
      'build-plan.yaml',
      'deployment-environment.yaml',
      'deployment-project.yaml',
      'deployment.yaml',
      'global.yaml',
      'project.yaml',
    ]);
  });

  test('apply prints what was granted and revoked', async () => {
    const out = capture();
    const code = await runCli(
      ['apply', '--desired', desiredPath, '--snapshot', snapshotPath, '--report-dir', reportDir, '--domain', 'global'],
      {},
      out.io,
    );

    expect(code).toBe(0);
    expect(out.stdout().trimEnd().split('\n').slice(1)).toEqual([
      'global: succeeded added=1 removed=1 unchanged=2 granted=1 revoked=1 failed=0',
    ]);
  });

  test('export writes the current state as a desired-state document', async () => {
    const out = capture();
    expect(await runCli(['export', '--snapshot', snapshotPath], {}, out.io)).toBe(0);

    const document = YAML.parse(out.stdout());
    expect(document.global_permissions).toEqual([
      { user: 'jdoe', permissions: ['VIEW'] },
      { user: 'leaver', permissions: ['VIEW'] },
      { group: 'bamboo-admins', permissions: ['ADMINISTER'] },
    ]);
    expect(document.build_plan_permissions).toEqual([]);
  });

  test('export --output writes a file', async () => {
    const out = capture();
    const output = join(dir, 'current.yaml');
    expect(await runCli(['export', '--snapshot', snapshotPath, '--output', output], {}, out.io)).toBe(0);

    expect(out.stdout()).toBe('');
    const document = YAML.parse(await readFile(output, 'utf8'));
    expect(document.global_permissions).toHaveLength(3);
  });

  test('a missing desired-state path exits with 2', async () => {
    const out = capture();
    expect(await runCli(['plan', '--snapshot', snapshotPath], {}, out.io)).toBe(2);
    expect(out.stderr()).toBe('error: Invalid configuration: RECONCILER_DESIRED_STATE (or --desired) is required\n');
  });

  test('a missing server URL exits with 2', async () => {
    const out = capture();
    expect(await runCli(['plan', '--desired', desiredPath], {}, out.io)).toBe(2);
    expect(lastLine(out.stderr())).toBe('error: Invalid configuration: BAMBOO_URL (or --bamboo-url) is required');
  });

  test('an invalid desired-state document exits with 2', async () => {
    await writeFile(desiredPath, 'global_permissions: []\n', 'utf8');
    const out = capture();
    expect(await runCli(['plan', '--desired', desiredPath, '--snapshot', snapshotPath], {}, out.io)).toBe(2);
    expect(lastLine(out.stderr())).toBe('error: 5 schema violations in desired state');
  });

  test('the desired-state path may come from the environment', async () => {
    const out = capture();
    const code = await runCli(
      ['plan', '--snapshot', snapshotPath],
      { RECONCILER_DESIRED_STATE: desiredPath, RECONCILER_REPORT_DIR: reportDir },
      out.io,
    );
    expect(code).toBe(0);
  });

  test('log lines go to stderr and to the log file', async () => {
    const out = capture();
    const logFile = join(dir, 'reconciler.log');
    await runCli(
      ['plan', '--desired', desiredPath, '--snapshot', snapshotPath, '--report-dir', reportDir, '--log-file', logFile],
      {},
      out.io,
    );

    const fileLines = (await readFile(logFile, 'utf8')).trimEnd().split('\n');
    const stderrLines = out.stderr().trimEnd().split('\n');
    expect(fileLines).toEqual(stderrLines);
    expect(JSON.parse(fileLines[0])).toMatchObject({ level: 'info', msg: 'Desired state loaded', path: desiredPath });
    expect(out.stdout()).not.toContain('"level"');
  });
});
