import { afterEach, describe, expect, it, vi } from 'vitest';
import { PvlDateTime, PvlGroup, PvlModule, PvlObject, Quantity, decode, dumps, encode, loads } from '../src/index.js';
import { PvlConfigError, PvlError, ParseError } from '../src/errors.js';

const LABEL = [
  'PDS_VERSION_ID = PDS3',
  '/* file characteristics */',
  'RECORD_TYPE = FIXED_LENGTH',
  '^IMAGE = ("IMG.IMG", 12)',
  'START_TIME = 2004-01-15T12:00:00.000Z',
  'OBJECT = IMAGE',
  '  LINES = 1024',
  '  UNIT_SCALE = 0.5 <DN>',
  'END_OBJECT = IMAGE',
  'END',
].join('\r\n');

describe('decode / encode', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('reads a PDS3 label', () => {
    const label = decode(LABEL, { dialect: 'pds3' });
    expect(label.keys()).toEqual(['PDS_VERSION_ID', 'RECORD_TYPE', '^IMAGE', 'START_TIME', 'IMAGE']);
    expect(label.get('^IMAGE')).toEqual(['IMG.IMG', 12]);

    const start = label.get('START_TIME');
    expect(start instanceof PvlDateTime && start.toDate().toISOString()).toBe('2004-01-15T12:00:00.000Z');

    const image = label.get('IMAGE');
    expect(image).toBeInstanceOf(PvlObject);
    expect(image instanceof PvlObject && image.get('UNIT_SCALE')).toEqual(new Quantity(0.5, 'DN'));
  });

  it('writes a label that reads back the same', () => {
    const label = decode(LABEL, { dialect: 'pds3' });
    const text = encode(label, { dialect: 'pds3' });
    expect(text.endsWith('END\r\n')).toBe(true);
    expect(decode(text, { dialect: 'pds3' }).equals(label)).toBe(true);
  });

  it('decodes with omni and encodes with pvl by default', () => {
    const module = decode('Group = g\n  a = x+y\nEnd_Group\nEnd');
    const g = module.get('g');
    expect(g).toBeInstanceOf(PvlGroup);
    expect(g instanceof PvlGroup && g.get('a')).toBe('x+y');
    expect(encode(new PvlModule([['a', 1]]))).toBe('a = 1;\nEND;');
  });

  it('applies layout options', () => {
    const text = encode(new PvlModule([['a', 1]]), { trailingNewline: true, endDelimiter: false });
    expect(text).toBe('a = 1\nEND\n');
  });

  it('rejects invalid options', () => {
    expect(() => encode(new PvlModule(), { width: 3 })).toThrow(PvlConfigError);
  });

  it('exposes loads and dumps as aliases', () => {
    expect(loads).toBe(decode);
    expect(dumps).toBe(encode);
  });
});

describe('environment defaults', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('takes the decode dialect from PVL_DIALECT', () => {
    vi.stubEnv('PVL_DIALECT', 'pvl');
    expect(() => decode('a = x+y;\nEND;')).toThrow(PvlError);
    expect(decode('a = x+y;\nEND;', { dialect: 'omni' }).get('a')).toBe('x+y');
  });

  it('takes the encode dialect from PVL_ENCODE_DIALECT', () => {
    vi.stubEnv('PVL_ENCODE_DIALECT', 'isis');
    expect(encode(new PvlModule([['a', 1]]))).toBe('a = 1\nEnd');
  });

  it('makes every dialect strict under PVL_STRICT', () => {
    expect(decode('a =\nEND').errors).toEqual([1]);
    vi.stubEnv('PVL_STRICT', 'true');
    expect(() => decode('a =\nEND')).toThrow(ParseError);
    expect(decode('a =\nEND', { strict: false }).errors).toEqual([1]);
  });

  it('refuses a decode-only dialect as the encode default', () => {
    vi.stubEnv('PVL_ENCODE_DIALECT', 'omni');
    expect(() => encode(new PvlModule())).toThrow(PvlConfigError);
  });
});
