import { getHttpStatus } from '../../src/api/middleware';
import { createTypedError } from '../../src/domain/errors';

describe('getHttpStatus', () => {
  test.each([
    ['VALIDATION.NOT_FOUND', 404],
    ['VALIDATION.REQUEST', 400],
    ['CONFIG.PARSE', 400],
    ['SCHEMA.INVALID', 400],
    ['RECONCILE.ALREADY_RUNNING', 409],
    ['SERVICE.UNREACHABLE', 503],
    ['FETCH.FAILED', 500],
    ['SYSTEM.INTERNAL', 500],
  ])('%s maps to %i', (code, status) => {
    expect(getHttpStatus(createTypedError({ code, message: 'x' }))).toBe(status);
  });
});
