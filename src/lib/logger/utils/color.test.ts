import { describe, expect, test } from 'vitest';
import { colorize } from './color';

describe('colorize', () => {
  test('keeps the text for every log type', () => {
    for (const type of [
      'error',
      'info',
      'warn',
      'success',
      'notice',
      'debug',
    ] as const) {
      expect(colorize(type, `${type} message`)).toContain(`${type} message`);
    }
  });
});
