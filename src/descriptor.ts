/**
 * Line-oriented descriptor protocol helpers: `{name=value}` fields and the sink lines go to.
 */

export type FieldValue = string | number | boolean;

/** A field that is always emitted. */
export function field(name: string, value: FieldValue): string {
  return `{${name}=${String(value)}}`;
}

/** A field that is omitted entirely when unset. */
export function optionalField(name: string, value: FieldValue | undefined): string {
  return value === undefined ? '' : field(name, value);
}

/** Anything that accepts text, e.g. process.stdout or a PassThrough in tests. */
export interface TextSink {
  write(chunk: string): unknown;
}

export function writeLines(sink: TextSink, lines: readonly string[]): void {
  if (lines.length === 0) return;
  sink.write(lines.map((line) => line + '\n').join(''));
}
