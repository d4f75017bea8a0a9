import { describe, it, expect, vi } from 'vitest';
import { existsSync } from 'node:fs';
import { mkdtemp, readFile, readdir } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { GazetteNotFoundError, InvalidPdfError } from '../src/errors.js';
import { downloadGazette, gazetteUrlFor, locateGazette, previousBusinessDay } from '../src/fetch.js';
import { processGazette } from '../src/gazette.js';

// Sunday 18 October 2026
const sunday = new Date(2026, 9, 18, 9, 0, 0);
const friday = new Date(2026, 9, 16, 9, 0, 0);

describe('previousBusinessDay', () => {
  it('rolls weekends back to Friday', () => {
    expect(previousBusinessDay(sunday).getDate()).toBe(16);
    expect(previousBusinessDay(new Date(2026, 9, 17)).getDate()).toBe(16);
  });

  it('keeps weekdays', () => {
    expect(previousBusinessDay(new Date(2026, 9, 14)).getDate()).toBe(14);
  });
});

describe('gazetteUrlFor', () => {
  it('keys the URL by compact date', () => {
    expect(gazetteUrlFor(friday)).toBe('https://www.boletinoficial.gob.ar/pdf/pdfPorNombre/20261016');
  });
});

describe('locateGazette', () => {
  it("returns the business day's issue when it exists", async () => {
    const probe = vi.fn(async () => true);

    const located = await locateGazette({ today: sunday, probe });

    expect(located.url).toBe('https://www.boletinoficial.gob.ar/pdf/pdfPorNombre/20261016');
    expect(probe).toHaveBeenCalledTimes(1);
  });

  it('falls back to the previous day once', async () => {
    const probe = vi.fn(async (url: string) => url.endsWith('20261015'));

    const located = await locateGazette({ today: sunday, probe });

    expect(located.url).toBe('https://www.boletinoficial.gob.ar/pdf/pdfPorNombre/20261015');
    expect(located.date.getDate()).toBe(15);
    expect(probe).toHaveBeenCalledTimes(2);
  });

  it('fails with the probed date range when neither day exists', async () => {
    const probe = vi.fn(async (_url: string) => false);

    const attempt = locateGazette({ today: sunday, probe });

    await expect(attempt).rejects.toBeInstanceOf(GazetteNotFoundError);
    await expect(attempt).rejects.toThrow('Gazette not found for date range 20261015-20261016');
    expect(probe.mock.calls.map(call => call[0])).toEqual([
      'https://www.boletinoficial.gob.ar/pdf/pdfPorNombre/20261016',
      'https://www.boletinoficial.gob.ar/pdf/pdfPorNombre/20261015'
    ]);
  });

  it('writes no file when the gazette cannot be found', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'gazette-'));
    const downloadDir = join(dir, 'downloads');
    const download = vi.fn(async () => new Uint8Array());

    await expect(processGazette({
      today: sunday,
      probe: async () => false,
      download,
      downloadDir,
      outputDir: join(dir, 'reports'),
      taxonomy: { topics: [], accounts: [] }
    })).rejects.toThrow('not found for date range');

    expect(download).not.toHaveBeenCalled();
    expect(await readdir(dir)).toEqual([]);
  });
});

describe('downloadGazette', () => {
  const located = { url: 'https://www.boletinoficial.gob.ar/pdf/pdfPorNombre/20261016', date: friday };

  it('saves a PDF under a date-keyed name', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'gazette-'));
    const bytes = new TextEncoder().encode('%PDF-1.7 contenido');

    const filePath = await downloadGazette(located, dir, async () => bytes);

    expect(filePath).toBe(join(dir, 'boletin_20261016.pdf'));
    expect(new Uint8Array(await readFile(filePath))).toEqual(bytes);
  });

  it('rejects a body without the PDF signature and writes nothing', async () => {
    const dir = join(await mkdtemp(join(tmpdir(), 'gazette-')), 'downloads');
    const html = new TextEncoder().encode('<html>Error</html>');

    await expect(downloadGazette(located, dir, async () => html)).rejects.toBeInstanceOf(InvalidPdfError);
    expect(existsSync(dir)).toBe(false);
  });
});
