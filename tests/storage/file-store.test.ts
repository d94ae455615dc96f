import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import YAML from 'yaml';
import { createFileStore } from '../../src/storage/file-store';
import { DiffReport } from '../../src/domain/run';
import { PermissionDomain } from '../../src/domain/permission';
import { globalGroup, globalUser } from '../fixtures';

describe('createFileStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'reports-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const report: DiffReport = {
    id: 'dif_1',
    runId: 'rec_1',
    domain: PermissionDomain.Global,
    mode: 'apply',
    added: [globalUser('jdoe', 'BUILD')],
    removed: [globalGroup('contractors', 'ADMINISTER')],
    unchanged: [],
    failures: [],
    createdAt: '2024-01-01T00:00:00Z',
    updatedAt: '2024-01-01T00:00:00Z',
  };

  test('writes each report under its run directory as it is created', async () => {
    const store = createFileStore(dir);
    await store.diffReports.create(report);

    const written = YAML.parse(await readFile(join(dir, 'rec_1', 'global.yaml'), 'utf8'));
    expect(written).toEqual({
      runId: 'rec_1',
      mode: 'apply',
      global_permissions_diff: [
        { change: 'added', subjectName: 'jdoe', subjectGroup: null, permission: 'BUILD', value: true },
        { change: 'removed', subjectName: null, subjectGroup: 'contractors', permission: 'ADMINISTER', value: true },
      ],
      failures: [],
    });
  });

  test('rewrites the file when the report is updated', async () => {
    const store = createFileStore(dir);
    await store.diffReports.create(report);
    await store.diffReports.update('dif_1', {
      failures: [
        {
          action: 'revoke',
          record: globalGroup('contractors', 'ADMINISTER'),
          error: {
            code: 'APPLY.REVOKE_FAILED',
            message: 'Failed to revoke global permission: denied',
            retryable: true,
            suggestedFixes: [],
          },
        },
      ],
    });

    const written = YAML.parse(await readFile(join(dir, 'rec_1', 'global.yaml'), 'utf8'));
    expect(written.failures).toEqual([
      {
        domain: 'global',
        stage: 'revoke',
        code: 'APPLY.REVOKE_FAILED',
        message: 'Failed to revoke global permission: denied',
        record: {
          change: 'removed',
          subjectName: null,
          subjectGroup: 'contractors',
          permission: 'ADMINISTER',
          value: true,
        },
      },
    ]);
    expect((await store.diffReports.listByRun('rec_1'))[0].failures).toHaveLength(1);
  });
});
