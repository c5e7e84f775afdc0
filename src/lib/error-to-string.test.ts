import { describe, expect, test } from 'vitest';
import { errorToString } from './error-to-string';
import { EOL } from './constants';

class LookupTestErr extends Error {
  public errPrefix = 'LookupErr';
  public errType = 'TestErr';
  public errCode = 'Missing';
  public additionalInfo: Record<string, unknown>;
  public sensitiveFieldNames = ['token'];

  constructor(additionalInfo: { key: string; token: string }) {
    super('Lookup failed');
    this.name = 'LookupTestErr';
    this.additionalInfo = additionalInfo;
  }
}

describe('errorToString', () => {
  test('stringifies non-object values as they are', () => {
    expect(errorToString('plain failure')).toBe('plain failure');
    expect(errorToString(42)).toBe('42');
    expect(errorToString(undefined)).toBe('undefined');
  });

  test('renders conventional fields and masks sensitive ones', () => {
    const error = new LookupTestErr({ key: 'config', token: 'test-secret' });
    const lines = errorToString(error).split(EOL);

    expect(lines.slice(0, 6)).toEqual([
      'LookupTestErr: Lookup failed',
      '    errPrefix: LookupErr',
      '    errType: TestErr',
      '    errCode: Missing',
      '    additionalInfo.key: config',
      '    additionalInfo.token: ***',
    ]);
    expect(lines[6]).toBe('Stack:');
  });

  test('follows the cause chain and keeps the innermost stack', () => {
    const cause = new Error('disk full');
    const error = new Error('write failed', { cause });
    const output = errorToString(error);
    const lines = output.split(EOL);

    expect(lines.slice(0, 4)).toEqual([
      'Error: write failed',
      'Caused by:',
      'Error: disk full',
      'Stack:',
    ]);
    expect(output.endsWith(cause.stack ?? '')).toBe(true);
  });

  test('renders a non-error cause', () => {
    const error = new Error('outer', { cause: 'socket closed' });
    const lines = errorToString(error).split(EOL);

    expect(lines.slice(0, 3)).toEqual([
      'Error: outer',
      'Caused by:',
      'socket closed',
    ]);
  });
});
