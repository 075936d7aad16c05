/**
 * Unit tests for the halfinspect console tool (src/console/halfinspect.ts).
 */
import { describe, it, expect } from 'vitest';
import {
  main,
  defaultOptions,
  formatLine,
  parseRounding,
} from '../../src/console/halfinspect.js';
import { Rounding } from '../../src/core/convert.js';
import { LowlevelError } from '../../src/core/error.js';
import { StringWriter } from '../../src/util/writer.js';

function run(args: string[], env: NodeJS.ProcessEnv = {}): { code: number; out: string; err: string } {
  const out = new StringWriter();
  const err = new StringWriter();
  const code = main(args, out, err, env);
  return { code, out: out.toString(), err: err.toString() };
}

describe('options', () => {
  it('parseRounding', () => {
    expect(parseRounding('truncate')).toBe(Rounding.truncate);
    expect(parseRounding('Nearest')).toBe(Rounding.nearestEven);
    expect(() => parseRounding('up')).toThrow(LowlevelError);
  });

  it('HALF_ROUNDING sets the default mode', () => {
    expect(defaultOptions({}).rounding).toBe(Rounding.truncate);
    expect(defaultOptions({ HALF_ROUNDING: '' }).rounding).toBe(Rounding.truncate);
    expect(defaultOptions({ HALF_ROUNDING: 'nearest' }).rounding).toBe(Rounding.nearestEven);
  });

  it('formatLine', () => {
    const opts = defaultOptions({});
    expect(formatLine(0x8001, opts)).toBe('0x8001 -5.96e-8 denormalized s=1 e=0 m=0x001');
    expect(formatLine(0x8001, { ...opts, binary: true })).toBe(
      '0x8001 -5.96e-8 denormalized 1 00000 0000000001',
    );
  });
});

describe('main', () => {
  it('prints one line per value', () => {
    const res = run(['1.0', '-2.5', '-inf']);
    expect(res.code).toBe(0);
    expect(res.err).toBe('');
    expect(res.out).toBe(
      '0x3c00 1.0 normalized s=0 e=15 m=0x000\n' +
      '0xc100 -2.5 normalized s=1 e=16 m=0x100\n' +
      '0xfc00 -inf infinity s=1 e=31 m=0x000\n',
    );
  });

  it('raw patterns in binary', () => {
    const res = run(['-x', '-b', '7e00', '0x0001']);
    expect(res.code).toBe(0);
    expect(res.out).toBe(
      '0x7e00 nan nan 0 11111 1000000000\n' +
      '0x0001 5.96e-8 denormalized 0 00000 0000000001\n',
    );
  });

  it('truncates unless told otherwise', () => {
    expect(run(['65520']).out).toBe('0x7bff 6.55e+4 normalized s=0 e=30 m=0x3ff\n');
    expect(run(['65520'], { HALF_ROUNDING: 'nearest' }).out).toBe(
      '0x7c00 inf infinity s=0 e=31 m=0x000\n',
    );
    expect(run(['-r', 'truncate', '65520'], { HALF_ROUNDING: 'nearest' }).out).toBe(
      '0x7bff 6.55e+4 normalized s=0 e=30 m=0x3ff\n',
    );
  });

  it('treats everything after -- as a value', () => {
    const res = run(['--', '-x']);
    expect(res.code).toBe(1);
    expect(res.err).toBe('Unable to parse half-precision value: "-x"\n');
  });

  it('reports parse errors', () => {
    const res = run(['bogus']);
    expect(res.code).toBe(1);
    expect(res.out).toBe('');
    expect(res.err).toBe('Unable to parse half-precision value: "bogus"\n');
    expect(run(['-x', '0x10000']).code).toBe(1);
  });

  it('reports bad rounding modes', () => {
    expect(run(['-r', 'sideways', '1']).err).toBe('Unknown rounding mode: sideways\n');
    expect(run(['-r']).err).toBe('Missing rounding mode after -r\n');
    expect(run(['1'], { HALF_ROUNDING: 'up' }).code).toBe(1);
  });

  it('prints usage without values', () => {
    const res = run(['-b']);
    expect(res.code).toBe(1);
    expect(res.err).toBe('usage: halfinspect [-x] [-b] [-r truncate|nearest] <value>...\n');
  });
});
