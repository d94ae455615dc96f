import { diffRecords, isConverged } from '../../src/engine/diff';
import { identityKey } from '../../src/domain/permission';
import { globalGroup, globalUser, planUser } from '../fixtures';

describe('diffRecords', () => {
  test('a subject whose permission moves shows one add and one remove', () => {
    const current = [globalUser('jdoe', 'VIEW'), globalGroup('admins', 'ADMINISTER')];
    const desired = [globalUser('jdoe', 'BUILD'), globalGroup('admins', 'ADMINISTER')];

    const diff = diffRecords(current, desired);

    expect(diff.added).toEqual([globalUser('jdoe', 'BUILD')]);
    expect(diff.removed).toEqual([globalUser('jdoe', 'VIEW')]);
    expect(diff.unchanged).toEqual([globalGroup('admins', 'ADMINISTER')]);
    expect(isConverged(diff)).toBe(false);
  });

  test('identical sets converge', () => {
    const records = [planUser('jdoe', 'VIEW', 'CORE', 'API'), planUser('jdoe', 'BUILD', 'CORE', 'API')];
    const diff = diffRecords(records, [...records].reverse());

    expect(diff.added).toEqual([]);
    expect(diff.removed).toEqual([]);
    expect(diff.unchanged).toHaveLength(2);
    expect(isConverged(diff)).toBe(true);
  });

  test('everything is added when nothing is granted yet', () => {
    const diff = diffRecords([], [globalUser('b', 'VIEW'), globalUser('a', 'VIEW')]);
    expect(diff.added.map((r) => r.subjectName)).toEqual(['a', 'b']);
    expect(diff.removed).toEqual([]);
  });

  test('everything is removed when the desired set is empty', () => {
    const diff = diffRecords([globalGroup('devs', 'BUILD')], []);
    expect(diff.removed).toEqual([globalGroup('devs', 'BUILD')]);
    expect(diff.added).toEqual([]);
  });

  test('duplicates on either side are counted once', () => {
    const diff = diffRecords(
      [globalUser('jdoe', 'VIEW'), globalUser('jdoe', 'VIEW')],
      [globalUser('jdoe', 'VIEW'), globalUser('jdoe', 'VIEW'), globalUser('amy', 'VIEW'), globalUser('amy', 'VIEW')],
    );
    expect(diff.unchanged).toHaveLength(1);
    expect(diff.added).toHaveLength(1);
  });

  test('the same grant on another plan is a different record', () => {
    const diff = diffRecords([planUser('jdoe', 'VIEW', 'CORE', 'API')], [planUser('jdoe', 'VIEW', 'CORE', 'WEB')]);
    expect(diff.added.map((r) => r.planKey)).toEqual(['WEB']);
    expect(diff.removed.map((r) => r.planKey)).toEqual(['API']);
  });

  test('added, removed and unchanged partition the union of both sides', () => {
    const current = [globalUser('a', 'VIEW'), globalUser('b', 'VIEW'), globalGroup('c', 'BUILD')];
    const desired = [globalUser('b', 'VIEW'), globalGroup('c', 'BUILD'), globalGroup('d', 'ADMINISTER')];
    const diff = diffRecords(current, desired);

    const keys = (records: typeof current) => records.map(identityKey);
    const union = new Set([...keys(current), ...keys(desired)]);
    const parts = [...keys(diff.added), ...keys(diff.removed), ...keys(diff.unchanged)];

    expect(parts).toHaveLength(union.size);
    expect(new Set(parts)).toEqual(union);
  });

  test('swapping the sides swaps added and removed', () => {
    const left = [globalUser('a', 'VIEW'), globalUser('b', 'VIEW')];
    const right = [globalUser('b', 'VIEW'), globalUser('c', 'VIEW')];
    const forward = diffRecords(left, right);
    const backward = diffRecords(right, left);

    expect(backward.added).toEqual(forward.removed);
    expect(backward.removed).toEqual(forward.added);
    expect(backward.unchanged).toEqual(forward.unchanged);
  });
});
