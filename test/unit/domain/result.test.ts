import { Failure, Success, describeError } from '../../../src/domain/types';

describe('Result', () => {
  it('builds success and failure values', () => {
    expect(Success(3)).toEqual({ ok: true, value: 3 });
    expect(Failure('denied')).toEqual({ ok: false, error: 'denied' });
  });
});

describe('describeError', () => {
  it('uses the message of errors', () => {
    expect(describeError(new Error('connect ECONNREFUSED'))).toBe('connect ECONNREFUSED');
  });

  it('uses the message of error-shaped objects that are not Error instances', () => {
    const fsError = { code: 'ENOENT', message: 'ENOENT: no such file or directory' };

    expect(describeError(fsError)).toBe('ENOENT: no such file or directory');
  });

  it('stringifies anything else', () => {
    expect(describeError('timeout')).toBe('timeout');
    expect(describeError(42)).toBe('42');
    expect(describeError({ message: 7 })).toBe('[object Object]');
  });
});
