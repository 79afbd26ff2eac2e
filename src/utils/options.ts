import type { AnalyzerOptions } from '../analyzers/types.js';

function parseValue(raw: string): unknown {
  const value = raw.trim();
  if (value === 'true' || value === 'yes' || value === 'on') return true;
  if (value === 'false' || value === 'no' || value === 'off') return false;
  if (value !== '' && !Number.isNaN(Number(value))) return Number(value);
  return value;
}

/**
 * Turn repeated `key=value` CLI arguments into analyzer options.
 * A bare `key` means `key=true`; `no-key` means `key=false`.
 */
export function parseOptionPairs(pairs: string[]): AnalyzerOptions {
  const options: AnalyzerOptions = {};

  for (const pair of pairs) {
    const eq = pair.indexOf('=');
    if (eq === -1) {
      const key = pair.trim();
      if (!key) continue;
      if (key.startsWith('no-') && key.length > 3) {
        options[key.slice(3)] = false;
      } else {
        options[key] = true;
      }
      continue;
    }

    const key = pair.slice(0, eq).trim();
    if (!key) {
      throw new Error(`Invalid option "${pair}": missing key`);
    }
    options[key] = parseValue(pair.slice(eq + 1));
  }

  return options;
}

/** commander `argParser` for a repeatable option. */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}
