import type { Result } from '../../shared/result.ts';
import { failure, success } from '../../shared/result.ts';

// milliseconds per unit
const UNITS: Readonly<Record<string, number>> = {
  ns: 1e-6,
  us: 1e-3,
  'µs': 1e-3,
  'μs': 1e-3,
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
};

const NUMBER = String.raw`(\d+(?:\.\d*)?|\.\d+)`;
const TERM = new RegExp(`^${NUMBER}(ns|us|µs|μs|ms|s|m|h)`);
const BARE_NUMBER = new RegExp(`^${NUMBER}$`);
const UNKNOWN_UNIT = new RegExp(`^${NUMBER}([^\\d.]+)`);

/**
 * Parses a Go duration string ("1h30m", "90s", "1.5m") into milliseconds.
 * Errors read like Go's own `time.ParseDuration` messages.
 */
export const parseGoDuration = (input: string): Result<number, string> => {
  const quoted = JSON.stringify(input);
  let rest = input;
  let sign = 1;

  if (rest.startsWith('-') || rest.startsWith('+')) {
    sign = rest.startsWith('-') ? -1 : 1;
    rest = rest.slice(1);
  }
  if (rest === '0') {
    return success(0);
  }
  if (rest === '') {
    return failure(`time: invalid duration ${quoted}`);
  }

  let total = 0;
  while (rest.length > 0) {
    const term = TERM.exec(rest);
    if (!term) {
      if (BARE_NUMBER.test(rest)) {
        return failure(`time: missing unit in duration ${quoted}`);
      }
      const unknown = UNKNOWN_UNIT.exec(rest);
      if (unknown) {
        return failure(`time: unknown unit ${JSON.stringify(unknown[2])} in duration ${quoted}`);
      }
      return failure(`time: invalid duration ${quoted}`);
    }
    total += Number.parseFloat(term[1]) * UNITS[term[2]];
    rest = rest.slice(term[0].length);
  }

  return success(sign * total);
};

/**
 * Formats milliseconds as seconds with two decimals, as xUnit `time` wants
 */
export const formatSeconds = (ms: number): string => (ms / 1000).toFixed(2);
