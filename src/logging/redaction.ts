export const REDACTION = '[redacted]';

const indexSegment = /^\d+$/;

/**
 * Redaction rules: exact dot-notation paths, plus key names that are redacted
 * wherever they appear.
 */
export type RedactionRules = {
  paths: string[];
  keys?: string[];
};

function childPaths(paths: string[], segment: string): string[] {
  const prefix = `${segment}.`;
  return paths
    .filter((path) => path.startsWith(prefix))
    .map((path) => path.slice(prefix.length));
}

function redactValue(
  value: unknown,
  paths: string[],
  keys: Set<string>,
  redaction: string
): unknown {
  if (value === null || typeof value !== 'object') {
    return value;
  }

  if (paths.length === 0 && keys.size === 0) {
    return value;
  }

  if (Array.isArray(value)) {
    // Paths that do not start with an index apply to every element
    const shared = paths.filter((path) => !indexSegment.test(path.split('.')[0]));
    return value.map((item, index) => {
      const segment = String(index);
      if (paths.includes(segment)) {
        return redaction;
      }
      return redactValue(
        item,
        [...childPaths(paths, segment), ...shared],
        keys,
        redaction
      );
    });
  }

  if (value instanceof Date) {
    return value;
  }

  const result: Record<string, unknown> = {};
  for (const [key, nested] of Object.entries(value)) {
    if (keys.has(key) || paths.includes(key)) {
      result[key] = redaction;
    } else {
      result[key] = redactValue(nested, childPaths(paths, key), keys, redaction);
    }
  }
  return result;
}

/**
 * Returns a copy of `obj` with sensitive values replaced.
 *
 * Paths use dot notation (`user.email`, `items.0.secret`); a path segment
 * that is not an index applies to every element of an array
 * (`users.password`). Names in `keys` are redacted at any depth.
 *
 * @example
 * ```typescript
 * redact({ config: { clientSecret: 's' }, code: 'c' }, { paths: ['code'], keys: ['clientSecret'] });
 * // { config: { clientSecret: '[redacted]' }, code: '[redacted]' }
 * ```
 */
export function redact<T>(
  obj: T,
  rules: RedactionRules | string[],
  redaction = REDACTION
): T {
  const { paths, keys = [] } = Array.isArray(rules) ? { paths: rules } : rules;
  // The walk preserves the shape of its input
  return redactValue(obj, paths, new Set(keys), redaction) as T;
}
