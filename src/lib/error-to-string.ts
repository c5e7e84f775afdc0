import { EOL, INDENT } from './constants';

function safeStringify(value: unknown): string {
  if (value === null || value === undefined) {
    return String(value);
  }

  switch (typeof value) {
    case 'string':
      return value;
    case 'number':
    case 'boolean':
    case 'bigint':
      return String(value);
    case 'object':
      try {
        return JSON.stringify(value);
      } catch {
        return '[Unserializable]';
      }
    case 'function':
      return '[Function]';
    case 'symbol':
      return value.toString();
    default:
      return String(value as string | number | boolean);
  }
}

function describeError(error: Record<string, unknown>): string[] {
  const lines: string[] = [];
  const name = error['name'] ? safeStringify(error['name']) : 'Error';
  const message = error['message'] ? safeStringify(error['message']) : '';

  lines.push(message.length > 0 ? `${name}: ${message}` : name);

  // conventional fields used to enhance error objects
  for (const key of ['code', 'errPrefix', 'errType', 'errCode']) {
    if (error[key]) {
      lines.push(`${INDENT}${key}: ${safeStringify(error[key])}`);
    }
  }

  const additionalInfo = error['additionalInfo'];

  if (additionalInfo && typeof additionalInfo === 'object') {
    const sensitiveFieldNames = Array.isArray(error['sensitiveFieldNames'])
      ? error['sensitiveFieldNames']
      : [];

    for (const [key, value] of Object.entries(additionalInfo)) {
      const rendered = sensitiveFieldNames.includes(key)
        ? '***'
        : safeStringify(value);

      lines.push(`${INDENT}additionalInfo.${key}: ${rendered}`);
    }
  }

  return lines;
}

/**
 * Renders an error, its `cause` chain and the innermost stack as plain text.
 * Non-object values are stringified as they are.
 */
export function errorToString(error: unknown): string {
  if (!error || typeof error !== 'object') {
    return safeStringify(error);
  }

  const lines: string[] = [];
  const seen = new Set<object>();
  let current: unknown = error;
  let stack: string | undefined;

  while (current && typeof current === 'object' && !seen.has(current)) {
    seen.add(current);

    const record = current as Record<string, unknown>;

    if (lines.length > 0) {
      lines.push('Caused by:');
    }

    lines.push(...describeError(record));

    if (typeof record['stack'] === 'string') {
      stack = record['stack'];
    }

    current = record['cause'];
  }

  if (current !== undefined && (!current || typeof current !== 'object')) {
    lines.push('Caused by:', safeStringify(current));
  }

  if (stack) {
    lines.push('Stack:', stack);
  }

  return lines.join(EOL);
}
