export const FIELD_SEPARATOR = '|';

export function splitFields(line: string): string[] {
  return line.split(FIELD_SEPARATOR);
}

export function joinFields(fields: readonly string[]): string {
  return fields.join(FIELD_SEPARATOR);
}
