// Lightweight helper to convert snake_case keys (SQLite columns, legacy form payloads)
// to camelCase (everything in code)

const camelize = (str: string) => str.replace(/_([a-z])/g, (_, g: string) => g.toUpperCase());

function isPlainObject(input: unknown): input is Record<string, unknown> {
  return typeof input === 'object' && input !== null && !Array.isArray(input) && !(input instanceof Date) && !Buffer.isBuffer(input);
}

function convertKeys(input: unknown, rename: (key: string) => string): unknown {
  if (Array.isArray(input)) {
    return input.map((v) => convertKeys(v, rename));
  }
  if (isPlainObject(input)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(input)) {
      out[rename(k)] = convertKeys(v, rename);
    }
    return out;
  }
  return input;
}

export function toCamelCaseKeys(input: unknown): unknown {
  return convertKeys(input, camelize);
}

