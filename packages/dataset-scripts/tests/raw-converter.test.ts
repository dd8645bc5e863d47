/**
 * Raw converter tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { DatasetReadError, DatasetValidationError, rawDatasetSchema } from '@ekadashi/contracts';
import { createLogger } from '@ekadashi/logger';
import { configSchema } from '../src/config/index.js';
import { buildRawDocument, convertRawEntries, runRawConversion } from '../src/raw-converter.js';

const fixturePath = (name: string): string => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

const sampleEntries = rawDatasetSchema.parse(JSON.parse(readFileSync(fixturePath('raw-pst-sample.json'), 'utf-8')));

const RUN_DATE = new Date(2026, 9, 19, 12, 0);

describe('convertRawEntries', () => {
  const logger = createLogger({ level: 'debug', silent: true });

  it('should number entries 1..N in input order', () => {
    const entries = convertRawEntries(sampleEntries, 'PST', logger);

    expect(entries.map((e) => e.id)).toEqual([1, 2, 3]);
    expect(entries.map((e) => e.name)).toEqual([
      { en: 'Shattila Ekadashi' },
      { en: 'Kamada Ekadashi' },
      { en: 'Utpanna Ekadashi' },
    ]);
  });

  it('should key timing by region with the fasting date and Parana instants', () => {
    const [shattila, , utpanna] = convertRawEntries(sampleEntries, 'PST', logger);

    expect(shattila?.timing).toEqual({
      PST: {
        date: '2026-01-13',
        parana_start: '2026-01-14T07:21:00-08:00',
        parana_end: '2026-01-14T09:28:00-08:00',
      },
    });
    expect(utpanna?.timing).toEqual({
      PST: {
        date: '2026-11-04',
        parana_start: '2026-11-05T06:35:00-08:00',
        parana_end: '2026-11-05T08:49:00-08:00',
      },
    });
  });

  it('should apply the summer offset to Parana times during DST', () => {
    const kamada = convertRawEntries(sampleEntries, 'PST', logger)[1];

    expect(kamada?.timing['PST']?.parana_start).toBe('2026-03-29T06:52:00-07:00');
  });

  it('should emit null for a time that cannot be converted and keep going', () => {
    const entries = convertRawEntries(sampleEntries, 'PST', logger);

    expect(entries).toHaveLength(3);
    expect(entries[1]?.timing['PST']?.parana_end).toBeNull();
    expect(entries[2]?.timing['PST']?.parana_end).toBe('2026-11-05T08:49:00-08:00');
  });

  it('should log each unconverted field as a warning', () => {
    const warn = vi.spyOn(logger, 'warn');

    convertRawEntries(sampleEntries, 'PST', logger);

    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith('Could not convert parana_end for Kamada Ekadashi', {
      entry: 'Kamada Ekadashi',
      field: 'parana_end',
      date: '2026-03-29',
      time: '',
    });
    warn.mockRestore();
  });

  it('should treat a null or missing Parana time as no value', () => {
    const rows = rawDatasetSchema.parse([
      {
        name: 'Mokshada Ekadashi',
        fasting_date: '2026-12-20',
        parana_date: '2026-12-21',
        parana_start: '07:15 AM',
        parana_end: null,
      },
      { name: 'Saphala Ekadashi', fasting_date: '2026-01-04', parana_date: '2026-01-05', parana_start: '07:22 AM' },
    ]);
    const warn = vi.spyOn(logger, 'warn');

    const entries = convertRawEntries(rows, 'PST', logger);

    expect(entries[0]?.timing['PST']).toEqual({
      date: '2026-12-20',
      parana_start: '2026-12-21T07:15:00-08:00',
      parana_end: null,
    });
    expect(entries[1]?.timing['PST']).toEqual({
      date: '2026-01-04',
      parana_start: '2026-01-05T07:22:00-08:00',
      parana_end: null,
    });
    expect(warn).toHaveBeenCalledTimes(2);
    expect(warn).toHaveBeenNthCalledWith(1, 'Could not convert parana_end for Mokshada Ekadashi', {
      entry: 'Mokshada Ekadashi',
      field: 'parana_end',
      date: '2026-12-21',
      time: null,
    });
    expect(warn).toHaveBeenNthCalledWith(2, 'Could not convert parana_end for Saphala Ekadashi', {
      entry: 'Saphala Ekadashi',
      field: 'parana_end',
      date: '2026-01-05',
      time: undefined,
    });
    warn.mockRestore();
  });

  it('should null both instants when the Parana date is missing', () => {
    const rows = rawDatasetSchema.parse([
      { name: 'Nirjala Ekadashi', fasting_date: '2026-06-25', parana_start: '05:36 AM', parana_end: '10:12 AM' },
    ]);

    const [nirjala] = convertRawEntries(rows, 'PST', logger);

    expect(nirjala?.timing).toEqual({ PST: { date: '2026-06-25', parana_start: null, parana_end: null } });
  });

  it('should not emit a fasting_start field', () => {
    const entries = convertRawEntries(sampleEntries, 'PST', logger);

    for (const entry of entries) {
      expect(entry.timing['PST']).not.toHaveProperty('fasting_start');
    }
  });

  it('should return an empty list for empty input', () => {
    expect(convertRawEntries([], 'PST', logger)).toEqual([]);
  });
});

describe('buildRawDocument', () => {
  const logger = createLogger({ level: 'info', silent: true });
  const config = configSchema.parse({}).rawConversion;

  it('should wrap entries with the fixed header and the run date', () => {
    const document = buildRawDocument(sampleEntries, config, logger, RUN_DATE);

    expect(document.version).toBe('1.5');
    expect(document.generated).toBe('2026-10-19');
    expect(document.source).toBe('Drik Panchang (San Jose)');
    expect(document.year).toBe(2026);
    expect(document.notes).toBe('Parana times for San Jose, CA. Includes DST adjustments.');
    expect(document.ekadashis).toHaveLength(3);
  });

  it('should list header keys before ekadashis', () => {
    const document = buildRawDocument(sampleEntries, config, logger, RUN_DATE);

    expect(Object.keys(document)).toEqual(['version', 'generated', 'source', 'year', 'notes', 'ekadashis']);
  });
});

describe('runRawConversion', () => {
  const logger = createLogger({ level: 'info', silent: true });
  let workDir: string;

  beforeEach(() => {
    workDir = mkdtempSync(join(tmpdir(), 'ekadashi-raw-'));
  });

  afterEach(() => {
    rmSync(workDir, { recursive: true, force: true });
  });

  const configFor = (inputPath: string) => ({
    ...configSchema.parse({}).rawConversion,
    inputPath,
    outputPath: join(workDir, 'assets', 'ekadashi_data_pst_2026.json'),
  });

  it('should write the pretty-printed document', () => {
    const config = configFor(fixturePath('raw-pst-sample.json'));

    const document = runRawConversion(config, logger, RUN_DATE);

    const written = readFileSync(config.outputPath, 'utf-8');
    expect(JSON.parse(written)).toEqual(document);
    expect(written.startsWith('{\n  "version": "1.5",\n  "generated": "2026-10-19",')).toBe(true);
  });

  it('should write null for unconverted times', () => {
    const config = configFor(fixturePath('raw-pst-sample.json'));

    runRawConversion(config, logger, RUN_DATE);

    const written = JSON.parse(readFileSync(config.outputPath, 'utf-8'));
    expect(written.ekadashis[1].timing.PST.parana_end).toBeNull();
  });

  it('should write null instants for null or missing times in the input file', () => {
    const inputPath = join(workDir, 'raw.json');
    writeFileSync(
      inputPath,
      JSON.stringify([
        {
          name: 'Mokshada Ekadashi',
          fasting_date: '2026-12-20',
          parana_date: '2026-12-21',
          parana_start: '07:15 AM',
          parana_end: null,
        },
        { name: 'Saphala Ekadashi', fasting_date: '2026-01-04', parana_date: '2026-01-05', parana_start: '07:22 AM' },
      ])
    );
    const config = configFor(inputPath);

    const document = runRawConversion(config, logger, RUN_DATE);

    expect(document.ekadashis).toHaveLength(2);
    const written = JSON.parse(readFileSync(config.outputPath, 'utf-8'));
    expect(written.ekadashis[0].timing.PST.parana_end).toBeNull();
    expect(written.ekadashis[1].timing.PST).toEqual({
      date: '2026-01-04',
      parana_start: '2026-01-05T07:22:00-08:00',
      parana_end: null,
    });
  });

  it('should log a completion notice', () => {
    const info = vi.spyOn(logger, 'info');
    const config = configFor(fixturePath('raw-pst-sample.json'));

    runRawConversion(config, logger, RUN_DATE);

    expect(info).toHaveBeenCalledWith(`Created ${config.outputPath}`, { count: 3 });
    info.mockRestore();
  });

  it('should fail without writing when the input is missing', () => {
    const config = configFor(join(workDir, 'missing.json'));

    expect(() => runRawConversion(config, logger, RUN_DATE)).toThrow(DatasetReadError);
    expect(existsSync(config.outputPath)).toBe(false);
  });

  it('should leave an existing output untouched when the input is malformed', () => {
    const inputPath = join(workDir, 'raw.json');
    writeFileSync(inputPath, '[{"name": "Kamada Ekadashi"}]');
    const config = configFor(inputPath);
    runRawConversion(configFor(fixturePath('raw-pst-sample.json')), logger, RUN_DATE);
    const before = readFileSync(config.outputPath, 'utf-8');

    expect(() => runRawConversion(config, logger, RUN_DATE)).toThrow(DatasetValidationError);
    expect(readFileSync(config.outputPath, 'utf-8')).toBe(before);
  });
});
