export function jsonSafeReplacer(_key: string, value: unknown): unknown {
  if (typeof value === 'bigint') return value.toString();
  if (value instanceof RegExp) return value.toString();
  return value;
}

/**
 * JSON.stringify that tolerates BigInt and never throws; cyclic or otherwise
 * unserializable values yield `undefined` so callers can pick a fallback.
 */
export function safeStringify(value: unknown, indent?: number): string | undefined {
  try {
    return JSON.stringify(value, jsonSafeReplacer, indent);
  } catch {
    return undefined;
  }
}
