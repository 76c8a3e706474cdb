// packages/shard-targets/src/json.ts
//
// JSON text <-> values, keeping integers that do not fit a double.
// Target hashes are uint64 and written as bare JSON integers.
import { parse, stringify } from 'lossless-json';

const INTEGER = /^-?\d+$/;

// unsafe integers become bigint, everything else stays a plain number
function parseNumber(text: string): number | bigint {
  const n = Number(text);
  if (INTEGER.test(text) && !Number.isSafeInteger(n)) return BigInt(text);
  return n;
}

export function parseJson(text: string): unknown {
  return parse(text, null, parseNumber);
}

/** bigint values are written as unquoted integers. */
export function stringifyJson(value: unknown, space?: number): string {
  const out = stringify(value, undefined, space);
  if (out === undefined) throw new Error('stringify: value has no JSON representation');
  return out;
}
