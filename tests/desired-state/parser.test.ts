import { parseDesiredStateText, readDesiredStateFile } from '../../src/desired-state/parser';
import { ConfigParseError } from '../../src/domain/errors';

describe('parseDesiredStateText', () => {
  test('parses YAML into plain values', () => {
    expect(parseDesiredStateText('global_permissions:\n  - user: jdoe\n    permissions: [VIEW]\n')).toEqual({
      global_permissions: [{ user: 'jdoe', permissions: ['VIEW'] }],
    });
  });

  test('malformed YAML is a parse error with its position', () => {
    let caught: unknown;
    try {
      parseDesiredStateText('global_permissions:\n  - user: [jdoe\n', 'access.yaml');
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigParseError);
    if (!(caught instanceof ConfigParseError)) return;
    expect(caught.typedError.code).toBe('CONFIG.PARSE');
    expect(caught.message.startsWith('Cannot parse desired state access.yaml: ')).toBe(true);
    expect(caught.typedError.details).toMatchObject({ source: 'access.yaml', line: expect.any(Number) });
  });
});

describe('readDesiredStateFile', () => {
  test('an unreadable file is a parse error naming the path', async () => {
    await expect(readDesiredStateFile('/nonexistent/access.yaml')).rejects.toThrow(
      /^Cannot read desired state file \/nonexistent\/access\.yaml: /,
    );
  });
});
