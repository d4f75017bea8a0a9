import { describe, it, expect, vi } from 'vitest';
import ExcelJS from 'exceljs';
import { readFile, mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  collectFeedNews,
  fetchFeedEntries,
  listMedia,
  loadSheetNews,
  normalizeFeedEntry,
  normalizeSheetRow,
  parseFeedXml
} from '../src/news.js';
import type { FeedSource } from '../src/types.js';

const fixture = (name: string) => readFile(fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url)), 'utf-8');

// Sunday 18 October 2026, local time
const today = new Date(2026, 9, 18, 12, 0, 0);
const noWait = async () => {};

function rss(items: Array<{ title: string; pubDate?: string }>): string {
  const body = items
    .map(item => `<item><title>${item.title}</title><link>https://diario.example.com/${encodeURIComponent(item.title)}</link>${item.pubDate ? `<pubDate>${item.pubDate}</pubDate>` : ''}</item>`)
    .join('');
  return `<?xml version="1.0"?><rss version="2.0"><channel><title>Prueba</title>${body}</channel></rss>`;
}

describe('normalizeFeedEntry', () => {
  it('keeps an entry published today', () => {
    const item = normalizeFeedEntry(
      { title: '  Titular  ', link: 'https://diario.example.com/1', published: '2026-10-18T08:00:00', summary: 'Resumen' },
      'diario',
      today
    );

    expect(item).toEqual({
      title: 'Titular',
      source_id: 'diario',
      published: '2026-10-18T08:00:00',
      link: 'https://diario.example.com/1',
      summary: 'Resumen'
    });
  });

  it('excludes an entry published yesterday', () => {
    expect(normalizeFeedEntry({ title: 'Ayer', published: '2026-10-17T23:59:00' }, 'diario', today)).toBeNull();
  });

  it('drops entries without a parseable date', () => {
    expect(normalizeFeedEntry({ title: 'Sin fecha' }, 'diario', today)).toBeNull();
    expect(normalizeFeedEntry({ title: 'Fecha rota', published: 'fecha desconocida' }, 'diario', today)).toBeNull();
  });

  it('reads the day in the zone the entry was published in', () => {
    const lateEvening = normalizeFeedEntry({ title: 'Cierre', published: 'Sun, 18 Oct 2026 22:30:00 -0300' }, 'diario', today);
    expect(lateEvening?.title).toBe('Cierre');

    expect(normalizeFeedEntry({ title: 'Madrugada', published: 'Mon, 19 Oct 2026 00:30:00 -0300' }, 'diario', today)).toBeNull();
    expect(normalizeFeedEntry({ title: 'Tarde', published: '2026-10-18T23:15:00-03:00' }, 'diario', today)?.title).toBe('Tarde');
    expect(normalizeFeedEntry({ title: 'Solo fecha', published: '2026-10-18' }, 'diario', today)?.title).toBe('Solo fecha');
  });

  it('falls back to a placeholder title', () => {
    expect(normalizeFeedEntry({ published: '2026-10-18T07:00:00' }, 'diario', today)?.title).toBe('Sin título');
  });
});

describe('normalizeSheetRow', () => {
  it('keeps rows dated today and takes the title from the first column', () => {
    expect(normalizeSheetRow({ Título: 'Nota del grupo', Fecha: '18/10/2026' }, 'Fecha', today)).toEqual({
      title: 'Nota del grupo',
      source_id: 'news_sheet',
      published: '18/10/2026'
    });
  });

  it('excludes rows from another day or without a title', () => {
    expect(normalizeSheetRow({ Título: 'Vieja', Fecha: '17/10/2026' }, 'Fecha', today)).toBeNull();
    expect(normalizeSheetRow({ Título: undefined, Fecha: '18/10/2026' }, 'Fecha', today)).toBeNull();
  });
});

describe('parseFeedXml', () => {
  it('reads RSS items', async () => {
    const entries = await parseFeedXml(await fixture('feed-rss.xml'));

    expect(entries).toEqual([
      {
        title: 'Nueva política de salud pública',
        link: 'https://diario.example.com/salud',
        published: 'Sun, 18 Oct 2026 09:30:00 GMT',
        summary: 'Detalle de la medida.'
      },
      {
        title: 'Licitación de obras de transporte',
        link: 'https://diario.example.com/transporte',
        published: 'Sat, 17 Oct 2026 11:00:00 GMT',
        summary: undefined
      },
      {
        title: 'Sube el impuesto a los combustibles',
        link: 'https://diario.example.com/impuestos',
        published: 'fecha desconocida',
        summary: undefined
      }
    ]);
  });

  it('reads Atom entries, preferring the alternate link', async () => {
    const entries = await parseFeedXml(await fixture('feed-atom.xml'));

    expect(entries).toEqual([
      {
        title: 'Aumenta la tarifa eléctrica',
        link: 'https://agencia.example.com/nota/1',
        published: '2026-10-18T08:00:00Z',
        summary: 'Resumen de la nota.'
      },
      {
        title: 'Entrada sin enlace',
        link: undefined,
        published: '2026-10-17T08:00:00Z',
        summary: undefined
      }
    ]);
  });

  it('rejects documents that are neither RSS nor Atom', async () => {
    await expect(parseFeedXml('<html><body>hola</body></html>')).rejects.toThrow('Unrecognised feed format');
  });
});

describe('fetchFeedEntries', () => {
  const source: FeedSource = { id: 'diario', name: 'Diario', url: 'https://diario.example.com/rss' };

  it("keeps only today's entries up to the limit", async () => {
    const xml = rss([
      { title: 'Primera', pubDate: '2026-10-18T09:00:00' },
      { title: 'Ayer', pubDate: '2026-10-17T09:00:00' },
      { title: 'Segunda', pubDate: '2026-10-18T10:00:00' },
      { title: 'Tercera', pubDate: '2026-10-18T11:00:00' }
    ]);

    const items = await fetchFeedEntries(source, { today, limit: 2, fetchText: async () => xml });

    expect(items.map(i => i.title)).toEqual(['Primera', 'Segunda']);
    expect(items[0].source_id).toBe('diario');
  });

  it('retries a failing fetch with the policy backoff', async () => {
    const fetchText = vi.fn()
      .mockRejectedValueOnce(new Error('timeout'))
      .mockRejectedValueOnce(new Error('timeout'))
      .mockResolvedValueOnce(rss([{ title: 'Al fin', pubDate: '2026-10-18T09:00:00' }]));
    const wait = vi.fn(noWait);

    const items = await fetchFeedEntries(source, { today, fetchText, wait });

    expect(items.map(i => i.title)).toEqual(['Al fin']);
    expect(fetchText).toHaveBeenCalledTimes(3);
    expect(wait).toHaveBeenCalledTimes(2);
    expect(wait).toHaveBeenCalledWith(2000);
  });

  it('throws once the attempts are exhausted', async () => {
    const fetchText = vi.fn().mockRejectedValue(new Error('HTTP 503'));

    await expect(
      fetchFeedEntries(source, { today, fetchText, wait: noWait, retry: { maxAttempts: 2, backoffMs: 10 } })
    ).rejects.toThrow('HTTP 503');
    expect(fetchText).toHaveBeenCalledTimes(2);
  });
});

describe('collectFeedNews', () => {
  it('keeps going when a feed fails', async () => {
    const sources: FeedSource[] = [
      { id: 'caido', name: 'Caído', url: 'https://caido.example.com/rss' },
      { id: 'uno', name: 'Uno', url: 'https://uno.example.com/rss' },
      { id: 'dos', name: 'Dos', url: 'https://dos.example.com/rss' },
      { id: 'tres', name: 'Tres', url: 'https://tres.example.com/rss' }
    ];
    const fetchText = async (url: string) => {
      if (url.includes('caido')) throw new Error('ECONNREFUSED');
      return rss([{ title: `Nota de ${new URL(url).hostname}`, pubDate: '2026-10-18T09:00:00' }]);
    };

    const items = await collectFeedNews(sources, { today, fetchText, wait: noWait });

    expect(items.map(i => i.source_id).sort()).toEqual(['dos', 'tres', 'uno']);
  });
});

describe('loadSheetNews', () => {
  it("reads today's rows from the Noticias sheet", async () => {
    const dir = await mkdtemp(join(tmpdir(), 'news-'));
    const file = join(dir, 'news.xlsx');
    const workbook = new ExcelJS.Workbook();
    workbook.addWorksheet('Otra').addRow(['ignorada', '18/10/2026']);
    const sheet = workbook.addWorksheet('Noticias');
    sheet.addRow(['Título', 'Fecha', 'Medio']);
    sheet.addRow(['Nuevo hospital regional', '18/10/2026', 'grupo']);
    sheet.addRow(['Noticia de ayer', '17/10/2026', 'grupo']);
    sheet.addRow([null, '18/10/2026', 'grupo']);
    await workbook.xlsx.writeFile(file);

    const items = await loadSheetNews(file, today);

    expect(items).toEqual([{ title: 'Nuevo hospital regional', source_id: 'news_sheet', published: '18/10/2026' }]);
  });

  it('matches date-typed cells against today', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'news-'));
    const file = join(dir, 'news.xlsx');
    const workbook = new ExcelJS.Workbook();
    const sheet = workbook.addWorksheet('Noticias');
    sheet.addRow(['Título', 'Fecha']);
    sheet.addRow(['Nuevo hospital regional', new Date(Date.UTC(2026, 9, 18))]);
    sheet.addRow(['Noticia de ayer', new Date(Date.UTC(2026, 9, 17))]);
    await workbook.xlsx.writeFile(file);

    const items = await loadSheetNews(file, today);

    expect(items).toEqual([{ title: 'Nuevo hospital regional', source_id: 'news_sheet', published: '18/10/2026' }]);
  });

  it('contributes nothing when the sheet is missing', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'news-'));
    expect(await loadSheetNews(join(dir, 'missing.xlsx'), today)).toEqual([]);
  });
});

describe('listMedia', () => {
  it('lists outlets once, without section suffixes', () => {
    const sources: FeedSource[] = [
      { id: 'a', name: 'La Voz - Política', url: 'https://a.example.com' },
      { id: 'b', name: 'La Voz', url: 'https://b.example.com' },
      { id: 'c', name: 'Clarín', url: 'https://c.example.com' },
      { id: 'd', name: 'Ámbito Financiero', url: 'https://d.example.com' }
    ];

    expect(listMedia(sources)).toEqual(['Ámbito Financiero', 'Clarín', 'La Voz']);
  });
});
