/**
 * A string is a pattern when it is anchored on both ends and has a body, or is exactly `^$`.
 */
export function isPattern(value: string): boolean {
  if (value === '^$') return true;
  return value.length > 2 && value.startsWith('^') && value.endsWith('$');
}

/**
 * Compile a pattern for whole-string matching. Returns null for syntax the engine rejects.
 */
export function compileFullMatch(pattern: string, flags = ''): RegExp | null {
  try {
    return new RegExp(`^(?:${pattern})$`, flags);
  } catch (err) {
    if (err instanceof SyntaxError) return null;
    throw err;
  }
}

/**
 * Literal equality, else a full match in whichever direction holds a pattern.
 */
export function textMatches(a: string, b: string, flags = ''): boolean {
  if (a === b) return true;
  if (isPattern(a) && compileFullMatch(a, flags)?.test(b)) return true;
  if (isPattern(b) && compileFullMatch(b, flags)?.test(a)) return true;
  return false;
}
