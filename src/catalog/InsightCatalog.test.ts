/**
 * InsightCatalog Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { CatalogError } from '../core/errors.js';
import { makeBank } from '../testing/fixtures.js';
import { InsightCatalog, insightId } from './InsightCatalog.js';

describe('InsightCatalog', () => {
  let dir: string;
  let catalog: InsightCatalog;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'insight-catalog-'));
    catalog = new InsightCatalog({
      sqlitePath: join(dir, 'catalog.db'),
      enableWAL: true,
      now: () => new Date('2025-01-15T08:00:00.000Z')
    });
  });

  afterEach(() => {
    catalog.close();
    rmSync(dir, { recursive: true, force: true });
  });

  it('builds ids from number, category and text hash', () => {
    const id = insightId(2, 'insight', 'Listen first today.');
    expect(id).toMatch(/^2_insight_[0-9a-f]{8}$/);
    expect(insightId(2, 'insight', '  LISTEN first   today. ')).toBe(id);
  });

  it('imports a bank once and skips entries already stored', () => {
    expect(catalog.importBank(makeBank(2, 2), 'NumberMessages_Complete_2')).toEqual({ added: 24, skipped: 0 });
    expect(catalog.importBank(makeBank(2, 2), 'another-source')).toEqual({ added: 0, skipped: 24 });
    expect(catalog.count()).toBe(24);
  });

  it('filters by number, category and source', () => {
    catalog.importBank(makeBank(2, 2), 'two');
    catalog.importBank(makeBank(5, 3), 'five');

    expect(catalog.count({ number: 2 })).toBe(24);
    expect(catalog.count({ number: 5, category: 'insight' })).toBe(3);
    expect(catalog.count({ source: 'five' })).toBe(36);

    const shadow = catalog.list({ number: 2, category: 'shadow' });
    expect(shadow.map(entry => entry.position)).toEqual([0, 1]);
    expect(shadow[0].id).toBe(insightId(2, 'shadow', shadow[0].text));
    expect(shadow[0].createdAt).toBe('2025-01-15T08:00:00.000Z');
    expect(catalog.list({ limit: 5 })).toHaveLength(5);
  });

  it('records served dates once per day and keeps the latest', () => {
    catalog.importBank(makeBank(2, 2), 'two');
    const [first] = catalog.list({ category: 'insight' });

    catalog.markServed(first.id, '2025-01-15');
    catalog.markServed(first.id, '2025-01-15');
    catalog.markServed(first.id, '2025-01-14');

    const served = catalog.get(first.id);
    expect(served?.servedCount).toBe(2);
    expect(served?.lastServed).toBe('2025-01-15');
    expect(catalog.count({ notServedSince: '2025-01-15' })).toBe(23);
    expect(catalog.count({ notServedSince: '2025-01-16' })).toBe(24);
  });

  it('rejects unknown ids and malformed dates', () => {
    catalog.importBank(makeBank(2, 1), 'two');
    const [entry] = catalog.list();

    expect(() => catalog.markServed('2_insight_00000000', '2025-01-15')).toThrow(CatalogError);
    expect(() => catalog.markServed(entry.id, '15/01/2025')).toThrow(/not a YYYY-MM-DD date/);
  });

  it('summarizes the catalog', () => {
    catalog.importBank(makeBank(2, 2), 'two');
    catalog.importBank(makeBank(11, 1), 'eleven');
    const [entry] = catalog.list({ number: 11 });
    catalog.markServed(entry.id, '2025-01-15');

    const stats = catalog.stats();

    expect(stats.total).toBe(36);
    expect(stats.byNumber).toEqual({ '2': 24, '11': 12 });
    expect(stats.byCategory.insight).toBe(3);
    expect(stats.sources).toBe(2);
    expect(stats.served).toBe(1);
  });
});
