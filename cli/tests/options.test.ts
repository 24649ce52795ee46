import fs from 'fs';
import os from 'os';
import path from 'path';
import { parseKeyValuePairs, parsePositiveInt } from '../src/types/CliRunOptions.js';
import { splitPaths } from '../src/commands/validate.js';
import { createFormatter } from '../src/formatters/createFormatter.js';
import { HumanFormatter } from '../src/formatters/HumanFormatter.js';
import { JsonFormatter } from '../src/formatters/JsonFormatter.js';
import { NullFormatter } from '../src/formatters/NullFormatter.js';
import { divider, formatDuration, formatSummary, formatValue } from '../src/utils/display.js';
import { loadInput } from '../src/utils/runSupport.js';

describe('parseKeyValuePairs', () => {
  it('decodes JSON values and keeps the rest as strings', () => {
    expect(
      parseKeyValuePairs(['count=3', 'name=alice', 'flag=true', 'list=[1,2]', 'quoted="x"', 'eq=a=b'])
    ).toEqual({ count: 3, name: 'alice', flag: true, list: [1, 2], quoted: 'x', eq: 'a=b' });
  });

  it('rejects pairs without a key', () => {
    expect(() => parseKeyValuePairs(['novalue'])).toThrow('Invalid key=value format: novalue');
    expect(() => parseKeyValuePairs(['=1'])).toThrow('Empty key in: =1');
  });
});

describe('parsePositiveInt', () => {
  it('accepts positive integers only', () => {
    expect(parsePositiveInt('3')).toBe(3);
    expect(() => parsePositiveInt('0')).toThrow('Expected a positive integer, got "0"');
    expect(() => parsePositiveInt('2.5')).toThrow('Expected a positive integer, got "2.5"');
    expect(() => parsePositiveInt('x')).toThrow('Expected a positive integer, got "x"');
  });
});

describe('splitPaths', () => {
  it('splits on commas and drops empty entries', () => {
    expect(splitPaths(' a.yaml, ,b.yaml ')).toEqual(['a.yaml', 'b.yaml']);
  });
});

describe('createFormatter', () => {
  it('creates each known formatter', () => {
    expect(createFormatter('human')).toBeInstanceOf(HumanFormatter);
    expect(createFormatter('json')).toBeInstanceOf(JsonFormatter);
    expect(createFormatter('null')).toBeInstanceOf(NullFormatter);
  });

  it('rejects unknown types', () => {
    expect(() => createFormatter('xml')).toThrow('Unknown formatter type: "xml". Valid types: human, json, null');
  });
});

describe('display helpers', () => {
  it('formats durations', () => {
    expect(formatDuration(850)).toBe('850ms');
    expect(formatDuration(2500)).toBe('2.50s');
    expect(formatDuration(65000)).toBe('1m 5s');
  });

  it('aligns summary rows', () => {
    expect(formatSummary([{ label: 'Run', value: 'r1' }, { label: 'Steps', value: 2 }])).toEqual([
      '  Run:   r1',
      '  Steps: 2',
    ]);
  });

  it('renders values on one line', () => {
    expect(formatValue('plain')).toBe('plain');
    expect(formatValue({ a: [1, 2] })).toBe('{"a":[1,2]}');
    expect(formatValue(undefined)).toBe('undefined');
  });

  it('draws dividers', () => {
    expect(divider(3, '=')).toBe('===');
    expect(divider()).toHaveLength(60);
  });
});

describe('loadInput', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'graphrun-input-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('layers the input file, --input and --set', async () => {
    const inputFile = path.join(dir, 'input.yaml');
    fs.writeFileSync(inputFile, 'a: 1\nb: 1\n');

    const input = await loadInput({ inputFile, input: '{"b":2,"c":2}', set: ['c=3'] });

    expect(input).toEqual({ a: 1, b: 2, c: 3 });
  });

  it('rejects input that is not an object', async () => {
    await expect(loadInput({ input: '[1]' })).rejects.toThrow('--input must be a JSON object');
  });
});
