// debug.ts

/**
 * Whether `DEBUG` enables `ns`. Tokens are comma/space separated; a trailing
 * `*` matches any suffix ("tagstream:*") and a leading `-` excludes.
 */
export function isDebugEnabled(ns: string, dbg: string | undefined = process.env.DEBUG): boolean {
  if (!dbg) return false;
  const matches = (pattern: string) =>
    pattern.endsWith('*') ? ns.startsWith(pattern.slice(0, -1)) : ns === pattern;

  let enabled = false;
  for (const token of dbg.split(/[\s,]+/).filter(Boolean)) {
    if (token.startsWith('-')) {
      if (matches(token.slice(1))) return false;
    } else if (matches(token)) {
      enabled = true;
    }
  }
  return enabled;
}

export function dlog(ns: string, ...args: unknown[]) {
  if (isDebugEnabled(ns)) {
    // eslint-disable-next-line no-console
    console.log(`[${ns}]`, ...args);
  }
}
