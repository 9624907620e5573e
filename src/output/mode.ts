export type OutputMode = { kind: 'structured'; pretty: boolean } | { kind: 'display' };

/**
 * Decide between JSON and tables for one invocation.
 *
 * Piped output is always JSON, compact unless --pretty was given. At a
 * terminal, --json or --pretty switch to indented JSON; otherwise tables.
 */
export function resolveOutputMode(opts: { json: boolean; pretty: boolean; interactive: boolean }): OutputMode {
  const pretty = opts.pretty || (opts.json && opts.interactive);
  if (!opts.interactive || opts.json || opts.pretty) {
    return { kind: 'structured', pretty };
  }
  return { kind: 'display' };
}

export function isStructured(mode: OutputMode): mode is { kind: 'structured'; pretty: boolean } {
  return mode.kind === 'structured';
}
