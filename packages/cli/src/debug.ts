/**
 * Write a labelled JSON payload to stderr.
 * Intended to be used behind the --debug flag.
 */
export function printDebug(label: string, payload: unknown): void {
  let body: string;
  try {
    body = JSON.stringify(payload, debugReplacer, 2);
  } catch (err: unknown) {
    body = `<unprintable: ${err instanceof Error ? err.message : String(err)}>`;
  }
  process.stderr.write(`[eskema] ${label}: ${body}\n`);
}

function debugReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? `${value.toString()}n` : value;
}
