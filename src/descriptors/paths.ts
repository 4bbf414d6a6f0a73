/**
 * Path conventions for generated endpoints.
 *
 *   /api/resource/<owner>[/{id}]
 *   /api/method/<owner>/<method>
 *
 * Owner and method segments are percent-encoded with encodeURIComponent.
 */

export const RESOURCE_PREFIX = '/api/resource/';
export const METHOD_PREFIX = '/api/method/';
export const ID_PLACEHOLDER = '{id}';

export function encodeSegment(value: string): string {
  return encodeURIComponent(value);
}

export function resourcePath(ownerType: string, withId: boolean = false): string {
  const base = `${RESOURCE_PREFIX}${encodeSegment(ownerType)}`;
  return withId ? `${base}/${ID_PLACEHOLDER}` : base;
}

export function methodPath(ownerType: string, methodName: string): string {
  return `${METHOD_PREFIX}${encodeSegment(ownerType)}/${encodeSegment(methodName)}`;
}

/**
 * The owner type a generated path belongs to, or null when the path does
 * not follow the convention (or its owner segment is not valid percent-encoding).
 */
export function ownerTypeOfPath(path: string): string | null {
  let rest: string;
  if (path.startsWith(RESOURCE_PREFIX)) {
    rest = path.slice(RESOURCE_PREFIX.length);
  } else if (path.startsWith(METHOD_PREFIX)) {
    rest = path.slice(METHOD_PREFIX.length);
    if (!rest.includes('/')) return null;
  } else {
    return null;
  }

  const segment = rest.split('/', 1)[0];
  if (segment === '') return null;
  try {
    return decodeURIComponent(segment);
  } catch {
    return null;
  }
}
