import { ValidationError } from './api/errors.js';

export type FlagValue = string | boolean | string[];
export type Flags = Record<string, FlagValue>;

export type ParsedArgs = {
  /** Non-flag tokens in order: group, subcommand, then arguments. */
  positionals: string[];
  flags: Flags;
};

/** Flags that never take a value, so `--json <id>` keeps `<id>` positional. */
export const BOOLEAN_FLAGS: ReadonlySet<string> = new Set([
  'json',
  'pretty',
  'verbose',
  'help',
  'closed',
  'open',
  'due-complete',
  'clear-due',
]);

function addFlag(flags: Flags, key: string, value: string | boolean): void {
  const prev = flags[key];
  if (prev === undefined) {
    flags[key] = value;
  } else if (Array.isArray(prev)) {
    prev.push(String(value));
  } else if (typeof prev === 'string') {
    flags[key] = [prev, String(value)];
  } else {
    flags[key] = value;
  }
}

function parseBoolean(key: string, raw: string): boolean {
  const v = raw.trim().toLowerCase();
  if (['true', 'yes', '1'].includes(v)) return true;
  if (['false', 'no', '0'].includes(v)) return false;
  throw new ValidationError(`--${key} expects true or false, got ${JSON.stringify(raw)}`);
}

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const positionals: string[] = [];
  const flags: Flags = {};

  for (let i = 0; i < argv.length; i++) {
    const tok = argv[i] ?? '';

    if (tok === '--') {
      positionals.push(...argv.slice(i + 1));
      break;
    }
    if (tok === '-h') {
      flags.help = true;
      continue;
    }
    if (!tok.startsWith('--') || tok === '--') {
      positionals.push(tok);
      continue;
    }

    const body = tok.slice(2);
    const eq = body.indexOf('=');
    if (eq >= 0) {
      const key = body.slice(0, eq);
      const raw = body.slice(eq + 1);
      addFlag(flags, key, BOOLEAN_FLAGS.has(key) ? parseBoolean(key, raw) : raw);
      continue;
    }

    if (BOOLEAN_FLAGS.has(body)) {
      addFlag(flags, body, true);
      continue;
    }

    const next = argv[i + 1];
    if (next !== undefined && !next.startsWith('--')) {
      addFlag(flags, body, next);
      i++;
    } else {
      addFlag(flags, body, true);
    }
  }

  return { positionals, flags };
}

// ---- Flag accessors ----

/** Last string value given for `name`, trimmed; undefined when absent. */
export function stringFlag(flags: Flags, name: string): string | undefined {
  const v = flags[name];
  if (v === undefined || typeof v === 'boolean') {
    if (v === true) throw new ValidationError(`--${name} requires a value`);
    return undefined;
  }
  const last = Array.isArray(v) ? v[v.length - 1] : v;
  return last?.trim();
}

/** Every value given for a repeatable flag, splitting comma-separated entries. */
export function listFlag(flags: Flags, name: string): string[] {
  const v = flags[name];
  if (v === undefined || typeof v === 'boolean') return [];
  const values = Array.isArray(v) ? v : [v];
  return values
    .flatMap((s) => s.split(','))
    .map((s) => s.trim())
    .filter(Boolean);
}

export function boolFlag(flags: Flags, name: string): boolean {
  return flags[name] === true;
}

/** true/false when the flag was given at all; undefined otherwise. */
export function changedBoolFlag(flags: Flags, name: string): boolean | undefined {
  const v = flags[name];
  return typeof v === 'boolean' ? v : undefined;
}

/** `--closed` / `--open` folded into one optional `closed` value. */
export function closedFlag(flags: Flags): boolean | undefined {
  const closed = changedBoolFlag(flags, 'closed');
  const open = changedBoolFlag(flags, 'open');
  if (closed !== undefined && open !== undefined) {
    throw new ValidationError('use either --closed or --open, not both');
  }
  if (open !== undefined) return !open;
  return closed;
}

export function requireFlag(flags: Flags, name: string): string {
  const v = stringFlag(flags, name);
  if (!v) throw new ValidationError(`--${name} is required`);
  return v;
}

export function intFlag(flags: Flags, name: string, fallback: number): number {
  const raw = stringFlag(flags, name);
  if (raw === undefined || raw === '') return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n)) throw new ValidationError(`--${name} expects an integer, got ${JSON.stringify(raw)}`);
  return n;
}

export function requireArg(args: readonly string[], index: number, name: string): string {
  const v = args[index];
  if (v === undefined || v.trim() === '') throw new ValidationError(`missing argument <${name}>`);
  return v;
}

export function expectArgs(args: readonly string[], max: number, usage: string): void {
  if (args.length > max) {
    throw new ValidationError(`too many arguments; usage: ${usage}`);
  }
}
