/**
 * Sentinel for "send this key with an explicit empty value".
 *
 * Plain empty strings are dropped by {@link mergeParams}; the API however
 * needs `due=` to remove a due date, so clearing a field has to be asked for
 * explicitly.
 */
export const CLEAR: unique symbol = Symbol('clear');
export type Clear = typeof CLEAR;

export type ParamValue = string | number | boolean | Clear | null | undefined;

/** One contributor to a request's query string (auth, required fields, flags, passthrough). */
export type ParamSource = Readonly<Record<string, ParamValue>>;

export type QueryParams = Readonly<Record<string, string>>;

function encodeValue(value: ParamValue): string | undefined {
  if (value === CLEAR) return '';
  if (value === undefined || value === null || value === '') return undefined;
  return String(value);
}

/**
 * Merge parameter sources left to right; the last source that contributes a
 * key wins. Empty, null and undefined values contribute nothing, so they
 * neither appear in the result nor mask an earlier value.
 */
export function mergeParams(...sources: ReadonlyArray<ParamSource | undefined>): QueryParams {
  const merged: Record<string, string> = {};
  for (const source of sources) {
    if (!source) continue;
    for (const [key, value] of Object.entries(source)) {
      const encoded = encodeValue(value);
      if (encoded !== undefined) merged[key] = encoded;
    }
  }
  return merged;
}
