import { InvalidInputError } from '../errors.js';
import type { InstalledSkillRef } from '../skills/types.js';

export interface ParsedArgs {
  command: string;
  positionals: string[];
  flags: Record<string, string | true>;
}

/** Switches that never take a value */
export const BOOLEAN_FLAGS: ReadonlySet<string> = new Set(['json', 'help']);

/**
 * Splits argv into a command, positionals and `--flag value` / `--flag=value`
 * pairs. A flag in `booleanFlags`, or one followed by another flag (or
 * nothing), is boolean.
 */
export function parseArgs(argv: string[], booleanFlags: ReadonlySet<string> = BOOLEAN_FLAGS): ParsedArgs {
  const [command = 'help', ...rest] = argv;
  const positionals: string[] = [];
  const flags: Record<string, string | true> = {};

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];

    if (arg === '--') {
      positionals.push(...rest.slice(i + 1));
      break;
    }

    if (!arg.startsWith('--')) {
      positionals.push(arg);
      continue;
    }

    const body = arg.slice(2);
    const eq = body.indexOf('=');
    if (eq >= 0) {
      flags[body.slice(0, eq)] = body.slice(eq + 1);
      continue;
    }

    const next = rest[i + 1];
    if (!booleanFlags.has(body) && next !== undefined && !next.startsWith('--')) {
      flags[body] = next;
      i++;
    } else {
      flags[body] = true;
    }
  }

  return { command, positionals, flags };
}

/** String value of a flag; boolean flags read as undefined */
export function flagValue(flags: ParsedArgs['flags'], name: string): string | undefined {
  const value = flags[name];
  return typeof value === 'string' ? value : undefined;
}

/** JSON.parse that reports bad input as InvalidInputError */
export function parseJsonArg(raw: string, what: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new InvalidInputError(`${what} is not valid JSON`, [error instanceof Error ? error.message : String(error)]);
  }
}

/**
 * Reads `--installed` as a JSON array of `{skillId, version}` or as a
 * `skill@version,skill@version` list.
 */
export function parseInstalledFlag(raw: string): InstalledSkillRef[] {
  if (raw.trim().startsWith('[')) {
    const parsed = parseJsonArg(raw, '--installed');
    if (!Array.isArray(parsed)) return [];
    return parsed.flatMap((entry: unknown) => {
      if (entry && typeof entry === 'object' && 'skillId' in entry && 'version' in entry) {
        return [{ skillId: String(entry.skillId), version: String(entry.version) }];
      }
      return [];
    });
  }

  return raw
    .split(',')
    .map(pair => pair.trim())
    .filter(Boolean)
    .map(pair => {
      const at = pair.lastIndexOf('@');
      return at > 0
        ? { skillId: pair.slice(0, at), version: pair.slice(at + 1) }
        : { skillId: pair, version: '' };
    });
}
