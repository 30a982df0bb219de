import { readFileSync } from 'node:fs';
import { describe, expect, it } from 'vitest';
import { silentLogger } from '../observability/logger';
import { CliIo, runEvaluate } from './evaluate';

const sampleText = readFileSync(new URL('../../data/market_data.example.json', import.meta.url), 'utf8');

const createIo = (files: Record<string, string>) => {
  const output: string[] = [];
  const io: CliIo = {
    env: { LOG_LEVEL: 'silent' },
    readFile: (path) => {
      const text = files[path];
      if (text === undefined) throw new Error(`ENOENT: ${path}`);
      return text;
    },
    write: (text) => {
      output.push(text);
    },
    logger: silentLogger(),
  };
  return { io, output };
};

describe('evaluate CLI', () => {
  it('prints the serialized snapshot', () => {
    const { io, output } = createIo({ 'market.json': sampleText });
    expect(runEvaluate(['market.json', '--version', '2025-11-21'], io)).toBe(0);

    const printed = JSON.parse(output.join(''));
    expect(printed.version).toBe('2025-11-21');
    expect(printed.rate_result.meeting_date).toBe('2025-12-21');
    expect(printed.credit_profiles.map((p: { issuer_id: string }) => p.issuer_id)).toEqual([
      'Issuer C',
      'Issuer A',
      'Issuer B',
    ]);
  });

  it('prints the dashboard view on request', () => {
    const { io, output } = createIo({ 'market.json': sampleText });
    expect(runEvaluate(['market.json', '--dashboard'], io)).toBe(0);
    expect(JSON.parse(output.join('')).ratePolicy.probabilities).toEqual({ noChange: 70, hike: 30, cut: 0 });
  });

  it('exits with 2 without a file argument', () => {
    const { io, output } = createIo({});
    expect(runEvaluate([], io)).toBe(2);
    expect(output).toEqual([]);
  });

  it('exits with 1 on an invalid environment value', () => {
    const { io, output } = createIo({ 'market.json': sampleText });
    expect(runEvaluate(['market.json'], { ...io, env: { RECOVERY_RATE: 'abc' } })).toBe(1);
    expect(output).toEqual([]);
  });

  it('exits with 2 on an unknown option', () => {
    const { io, output } = createIo({ 'market.json': sampleText });
    expect(runEvaluate(['market.json', '--bogus'], io)).toBe(2);
    expect(output).toEqual([]);
  });

  it('exits with 1 on unreadable, malformed or invalid input', () => {
    const { io } = createIo({
      'broken.json': '{ "rates": ',
      'no-meeting.json': JSON.stringify({ ...JSON.parse(sampleText), boj_meetings: [] }),
    });
    expect(runEvaluate(['missing.json'], io)).toBe(1);
    expect(runEvaluate(['broken.json'], io)).toBe(1);
    expect(runEvaluate(['no-meeting.json'], io)).toBe(1);
  });
});
