import { describe, expect, test } from 'vitest';
import { prepareErrorObjectLog } from './error-object';

describe('prepareErrorObjectLog', () => {
  test('puts the trimmed prefix on its own line', () => {
    expect(prepareErrorObjectLog('  Failed  ', 'reason')).toBe(
      'Failed: \n\nreason',
    );
  });

  test('omits an empty prefix', () => {
    expect(prepareErrorObjectLog('   ', 'reason')).toBe('reason');
  });
});
