import { describe, it, expect } from 'vitest';
import {
  classify,
  classifyDocuments,
  classifyNews,
  documentsForAccount,
  interestedAccounts
} from '../src/classify.js';
import { extractDocument } from '../src/extract.js';
import type { Account, NewsItem, Topic } from '../src/types.js';

const topics: Topic[] = [
  { name: 'Salud Pública', keywords: ['salud', 'hospital'] },
  { name: 'Energía', keywords: ['tarifa eléctrica', 'energía'] },
  { name: 'Vacío', keywords: [] },
  { name: 'Transporte', keywords: ['', 'ferrocarril'] }
];

const accounts: Account[] = [
  { name: 'Cuenta A', interested_topics: ['Salud Pública'] },
  { name: 'Cuenta B', interested_topics: ['Energía', 'Transporte'] },
  { name: 'Cuenta C', interested_topics: ['Tema inexistente'] }
];

describe('classify', () => {
  it('matches a topic by keyword containment', () => {
    const matches = classify('El ministerio anuncia nueva política de salud pública', [
      { name: 'Salud Pública', keywords: ['salud'] }
    ]);

    expect(matches).toEqual([{ topic: 'Salud Pública', matched_keyword: 'salud' }]);
  });

  it('records only the first matching keyword per topic', () => {
    const matches = classify('Nuevo HOSPITAL y más salud', topics);
    expect(matches).toEqual([{ topic: 'Salud Pública', matched_keyword: 'salud' }]);
  });

  it('returns topics in taxonomy order', () => {
    const matches = classify('Sube la tarifa eléctrica del ferrocarril y del hospital', topics);
    expect(matches).toEqual([
      { topic: 'Salud Pública', matched_keyword: 'hospital' },
      { topic: 'Energía', matched_keyword: 'tarifa eléctrica' },
      { topic: 'Transporte', matched_keyword: 'ferrocarril' }
    ]);
  });

  it('never matches a topic without keywords or through an empty keyword', () => {
    const matches = classify('cualquier texto', topics);
    expect(matches).toEqual([]);
  });

  it('matches inside longer words', () => {
    expect(classify('Saludo protocolar', topics)).toEqual([{ topic: 'Salud Pública', matched_keyword: 'salud' }]);
  });

  it('is deterministic', () => {
    const text = 'hospital y energía';
    expect(classify(text, topics)).toEqual(classify(text, topics));
  });
});

describe('interestedAccounts', () => {
  it('lists accounts following any matched topic', () => {
    const matches = [
      { topic: 'Energía', matched_keyword: 'energía' },
      { topic: 'Transporte', matched_keyword: 'ferrocarril' }
    ];
    expect(interestedAccounts(matches, accounts)).toEqual(['Cuenta B']);
  });

  it('returns nothing without matches', () => {
    expect(interestedAccounts([], accounts)).toEqual([]);
  });

  it('only grows when an account follows more topics', () => {
    const corpus = ['nuevo hospital', 'tarifa eléctrica', 'ferrocarril', 'sin coincidencias'];
    const before = classifyDocuments(
      corpus.map(text => extractDocument('DECREE', `DECRETO 1/2025\n${text}`)),
      { topics, accounts }
    );
    const widened = accounts.map(a => a.name === 'Cuenta A'
      ? { ...a, interested_topics: [...a.interested_topics, 'Energía'] }
      : a);
    const after = classifyDocuments(before.map(c => c.document), { topics, accounts: widened });

    const matchedBefore = documentsForAccount(before, 'Cuenta A').map(c => c.document.raw_text);
    const matchedAfter = documentsForAccount(after, 'Cuenta A').map(c => c.document.raw_text);

    expect(matchedBefore).toEqual(['DECRETO 1/2025\nnuevo hospital']);
    expect(matchedAfter).toEqual(['DECRETO 1/2025\nnuevo hospital', 'DECRETO 1/2025\ntarifa eléctrica']);
  });
});

describe('classifyNews', () => {
  it('annotates items and groups them by topic in taxonomy order', () => {
    const items: NewsItem[] = [
      { title: 'Paro de ferrocarril', source_id: 'uno' },
      { title: 'Hospital sin energía', source_id: 'dos' },
      { title: 'Resultados deportivos', source_id: 'tres' }
    ];

    const byTopic = classifyNews(items, topics);

    expect(Array.from(byTopic.keys())).toEqual(['Salud Pública', 'Energía', 'Transporte']);
    expect(byTopic.get('Energía')).toEqual([{ item: items[1], matched_keyword: 'energía' }]);
    expect(byTopic.get('Salud Pública')?.[0].matched_keyword).toBe('hospital');
    expect(items[1].matches).toEqual([
      { topic: 'Salud Pública', matched_keyword: 'hospital' },
      { topic: 'Energía', matched_keyword: 'energía' }
    ]);
    expect(items[2].matches).toEqual([]);
  });

  it('does not overwrite matches already present', () => {
    const existing = [{ topic: 'Manual', matched_keyword: 'manual' }];
    const item: NewsItem = { title: 'Nuevo hospital', source_id: 'uno', matches: existing };

    classifyNews([item], topics);

    expect(item.matches).toBe(existing);
  });
});
