#!/usr/bin/env node
/**
 * @file halfinspect.ts
 * @description Command-line inspector for half-precision values.
 *
 *   halfinspect [-x] [-b] [-r truncate|nearest] <value>...
 *
 * Prints one line per value: the raw pattern, the shortest decimal, the
 * class, and the sign/exponent/mantissa fields.
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';

import type { half } from '../core/types.js';
import { Rounding } from '../core/convert.js';
import { FloatClass } from '../core/classify.js';
import { describeHalf, halfToBinary, halfToHex, parseHalf, printHalf } from '../core/format.js';
import { HalfParseError, LowlevelError } from '../core/error.js';
import { ConsoleWriter, ErrorWriter, type Writer, writeLines } from '../util/writer.js';

const USAGE = 'usage: halfinspect [-x] [-b] [-r truncate|nearest] <value>...\n';
const RAW_PATTERN = /^(0x)?[0-9a-f]{1,4}$/i;

export interface InspectOptions {
  /** Read every value as a raw 16-bit pattern */
  rawBits: boolean;
  /** Print the pattern in binary instead of the field summary */
  binary: boolean;
  rounding: Rounding;
}

/**
 * Map a rounding mode name to its Rounding value.
 *
 * @throws LowlevelError for an unknown name
 */
export function parseRounding(name: string): Rounding {
  switch (name.toLowerCase()) {
    case 'truncate':
      return Rounding.truncate;
    case 'nearest':
      return Rounding.nearestEven;
    default:
      throw new LowlevelError('Unknown rounding mode: ' + name);
  }
}

/** Default options, with the rounding mode taken from HALF_ROUNDING when set */
export function defaultOptions(env: NodeJS.ProcessEnv): InspectOptions {
  const mode = env.HALF_ROUNDING;
  return {
    rawBits: false,
    binary: false,
    rounding: mode == null || mode.length === 0 ? Rounding.truncate : parseRounding(mode),
  };
}

function readValue(text: string, opts: InspectOptions): half {
  if (!opts.rawBits)
    return parseHalf(text, opts.rounding);
  if (!RAW_PATTERN.test(text))
    throw new HalfParseError(text);
  return parseInt(text.replace(/^0x/i, ''), 16);
}

/** One output line for the given pattern, without the trailing newline */
export function formatLine(h: half, opts: InspectOptions): string {
  const f = describeHalf(h);
  const fields = opts.binary
    ? halfToBinary(h)
    : `s=${f.sign} e=${f.exponent} m=0x${f.mantissa.toString(16).padStart(3, '0')}`;
  return `${halfToHex(h)} ${printHalf(h)} ${FloatClass[f.type]} ${fields}`;
}

/**
 * Entry point.
 *
 * @param args - command-line arguments (without the node / script prefix)
 * @param out - destination for results
 * @param err - destination for diagnostics
 * @returns exit code (0 for success, 1 for error)
 */
export function main(
  args: string[],
  out: Writer,
  err: Writer,
  env: NodeJS.ProcessEnv = process.env,
): number {
  const values: string[] = [];
  try {
    const opts = defaultOptions(env);
    let i = 0;
    for (; i < args.length; ++i) {
      const arg = args[i];
      if (arg === '--') {
        i++;
        break;
      } else if (arg === '-x') {
        opts.rawBits = true;
      } else if (arg === '-b') {
        opts.binary = true;
      } else if (arg === '-r') {
        i++;
        if (i >= args.length)
          throw new LowlevelError('Missing rounding mode after -r');
        opts.rounding = parseRounding(args[i]);
      } else {
        values.push(arg);
      }
    }
    values.push(...args.slice(i));

    if (values.length === 0) {
      err.write(USAGE);
      return 1;
    }

    writeLines(out, values.map((v) => formatLine(readValue(v, opts), opts)));
  } catch (e: unknown) {
    if (e instanceof LowlevelError) {
      err.write(e.explain + '\n');
      return 1;
    }
    throw e;
  }
  return 0;
}

// ---------------------------------------------------------------------------
// CLI entry point
// ---------------------------------------------------------------------------

function isEntryModule(): boolean {
  const script = process.argv[1];
  if (script === undefined || !fs.existsSync(script)) return false;
  return fs.realpathSync(path.resolve(script)) === fileURLToPath(import.meta.url);
}

if (isEntryModule()) {
  process.exitCode = main(process.argv.slice(2), new ConsoleWriter(), new ErrorWriter());
}
