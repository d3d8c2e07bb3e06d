// JSON export of parse trees
//
// Integers and field elements become decimal strings; byte strings become
// arrays of numbers.

function replacer(_key: string, value: unknown): unknown {
  if (typeof value === 'bigint') return value.toString();
  if (value instanceof Uint8Array) return Array.from(value);
  return value;
}

export function toJSON(tree: unknown, indent: number = 2): string {
  return JSON.stringify(tree, replacer, indent);
}
