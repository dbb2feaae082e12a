/**
 * Scoped process environment changes.
 *
 * Variables are set for the duration of `fn` only and restored to their
 * previous values (or deleted, when they were unset) once it settles,
 * whether it resolved or threw.
 */
export async function withScopedEnv<T>(
  overrides: Record<string, string | undefined>,
  fn: () => Promise<T>
): Promise<T> {
  const saved = new Map<string, string | undefined>();
  for (const [key, value] of Object.entries(overrides)) {
    saved.set(key, process.env[key]);
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }

  try {
    return await fn();
  } finally {
    for (const [key, value] of saved) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  }
}

/**
 * Prepend entries to a path-list variable value, keeping any existing value.
 */
export function prependPathList(entries: string[], existing: string | undefined, delimiter: string): string {
  return [...entries, ...(existing ? [existing] : [])].join(delimiter);
}
