/**
 * Wildcard pattern matching for owner type names.
 */

export function matchPattern(pattern: string, name: string): boolean {
  if (pattern === '*') return true;
  if (!pattern.includes('*')) return pattern === name;

  const segments = pattern.split('*');
  let pos = 0;

  if (!pattern.startsWith('*')) {
    if (!name.startsWith(segments[0])) return false;
    pos = segments[0].length;
  }

  for (let i = 1; i < segments.length; i++) {
    const segment = segments[i];
    if (!segment) continue;
    const idx = name.indexOf(segment, pos);
    if (idx === -1) return false;
    pos = idx + segment.length;
  }

  if (!pattern.endsWith('*')) {
    const last = segments[segments.length - 1];
    if (!name.endsWith(last) || name.length - last.length < segments[0].length) return false;
  }

  return true;
}

export function matchAny(patterns: readonly string[], name: string): boolean {
  return patterns.some((p) => matchPattern(p, name));
}
