/**
 * InsightCatalog - SQLite store of individual insight entries.
 *
 * Each entry gets a deterministic id `<number>_<category>_<hash8>` built from
 * its normalized text, so importing the same bank twice stores nothing new.
 */

import Database from 'better-sqlite3';
import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { INSIGHT_CATEGORIES } from '../core/constants.js';
import { CatalogError } from '../core/errors.js';
import {
  isBankNumber,
  isInsightCategory,
  type BankNumber,
  type InsightCategory,
  type NumberInsightBank
} from '../core/types.js';
import { hashText, normalizeForComparison } from '../dedupe/TextSimilarity.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export interface CatalogEntry {
  id: string;
  number: BankNumber;
  category: InsightCategory;
  text: string;
  source: string;
  /** Index of the entry within its category in the imported bank */
  position: number;
  createdAt: string;
  servedCount: number;
  lastServed?: string;
}

export interface CatalogFilter {
  number?: BankNumber;
  category?: InsightCategory;
  source?: string;
  /** Leave out entries served on or after this date (YYYY-MM-DD) */
  notServedSince?: string;
  limit?: number;
}

export interface ImportResult {
  added: number;
  skipped: number;
}

export interface CatalogStats {
  total: number;
  byNumber: Record<string, number>;
  byCategory: Record<string, number>;
  sources: number;
  served: number;
}

export interface InsightCatalogOptions {
  sqlitePath: string;
  enableWAL?: boolean;
  now?: () => Date;
}

interface InsightRow {
  id: string;
  number: number;
  category: string;
  text: string;
  source: string;
  position: number;
  created_at: string;
  served_count: number;
  last_served: string | null;
}

export function insightId(number: BankNumber, category: InsightCategory, text: string): string {
  return `${number}_${category}_${hashText(normalizeForComparison(text)).slice(0, 8)}`;
}

export class InsightCatalog {
  private db: Database.Database;
  private now: () => Date;

  constructor(options: InsightCatalogOptions) {
    this.now = options.now ?? (() => new Date());
    try {
      this.db = new Database(options.sqlitePath);
    } catch (error) {
      throw new CatalogError('open', error instanceof Error ? error.message : String(error));
    }

    if (options.enableWAL) {
      this.db.pragma('journal_mode = WAL');
    }

    this.db.pragma('foreign_keys = ON');
    this.initializeSchema();
  }

  private initializeSchema(): void {
    const schemaPath = join(__dirname, 'schema.sql');
    const schema = readFileSync(schemaPath, 'utf-8');
    this.db.exec(schema);
  }

  // ==========================================
  // WRITES
  // ==========================================

  importBank(bank: NumberInsightBank, source: string): ImportResult {
    const insert = this.db.prepare<[string, number, string, string, string, number, string]>(`
      INSERT OR IGNORE INTO insights (id, number, category, text, source, position, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?)
    `);

    const createdAt = this.now().toISOString();
    let added = 0;
    let skipped = 0;

    const transaction = this.db.transaction(() => {
      for (const category of INSIGHT_CATEGORIES) {
        bank.categories[category].forEach((text, position) => {
          const id = insightId(bank.number, category, text);
          const result = insert.run(id, bank.number, category, text, source, position, createdAt);
          if (result.changes > 0) {
            added++;
          } else {
            skipped++;
          }
        });
      }
    });

    transaction();
    return { added, skipped };
  }

  /**
   * Record that an entry was shown on a date. Serving twice on one date counts once.
   */
  markServed(id: string, date: string): void {
    if (!/^\d{4}-\d{2}-\d{2}$/.test(date)) {
      throw new CatalogError('markServed', `"${date}" is not a YYYY-MM-DD date`);
    }
    if (!this.get(id)) {
      throw new CatalogError('markServed', `no insight with id "${id}"`);
    }

    const log = this.db.prepare<[string, string]>(
      'INSERT OR IGNORE INTO served_log (insight_id, served_on) VALUES (?, ?)'
    );
    const update = this.db.prepare<[string, string, string]>(`
      UPDATE insights
      SET served_count = served_count + 1,
          last_served = CASE WHEN last_served IS NULL OR last_served < ? THEN ? ELSE last_served END
      WHERE id = ?
    `);

    const transaction = this.db.transaction(() => {
      if (log.run(id, date).changes > 0) {
        update.run(date, date, id);
      }
    });
    transaction();
  }

  // ==========================================
  // READS
  // ==========================================

  get(id: string): CatalogEntry | null {
    const row = this.db.prepare<[string], InsightRow>('SELECT * FROM insights WHERE id = ?').get(id);
    return row ? this.rowToEntry(row) : null;
  }

  count(filter: CatalogFilter = {}): number {
    const { where, params } = this.buildWhere(filter);
    const row = this.db
      .prepare<Array<string | number>, { total: number }>(`SELECT COUNT(*) AS total FROM insights ${where}`)
      .get(...params);
    return row?.total ?? 0;
  }

  list(filter: CatalogFilter = {}): CatalogEntry[] {
    const { where, params } = this.buildWhere(filter);
    const limit = filter.limit !== undefined ? ` LIMIT ${Math.max(0, Math.floor(filter.limit))}` : '';
    const rows = this.db
      .prepare<Array<string | number>, InsightRow>(
        `SELECT * FROM insights ${where} ORDER BY number, category, source, position${limit}`
      )
      .all(...params);
    return rows.map(row => this.rowToEntry(row));
  }

  stats(): CatalogStats {
    const total = this.count();
    const byNumber: Record<string, number> = {};
    const byCategory: Record<string, number> = {};

    const numberRows = this.db
      .prepare<[], { number: number; total: number }>('SELECT number, COUNT(*) AS total FROM insights GROUP BY number ORDER BY number')
      .all();
    for (const row of numberRows) {
      byNumber[String(row.number)] = row.total;
    }

    const categoryRows = this.db
      .prepare<[], { category: string; total: number }>('SELECT category, COUNT(*) AS total FROM insights GROUP BY category')
      .all();
    for (const category of INSIGHT_CATEGORIES) {
      const row = categoryRows.find(r => r.category === category);
      if (row) byCategory[category] = row.total;
    }

    const sources = this.db
      .prepare<[], { total: number }>('SELECT COUNT(DISTINCT source) AS total FROM insights')
      .get();
    const served = this.db
      .prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM insights WHERE served_count > 0')
      .get();

    return {
      total,
      byNumber,
      byCategory,
      sources: sources?.total ?? 0,
      served: served?.total ?? 0
    };
  }

  close(): void {
    this.db.close();
  }

  // ==========================================
  // HELPERS
  // ==========================================

  private buildWhere(filter: CatalogFilter): { where: string; params: Array<string | number> } {
    const clauses: string[] = [];
    const params: Array<string | number> = [];

    if (filter.number !== undefined) {
      clauses.push('number = ?');
      params.push(filter.number);
    }
    if (filter.category !== undefined) {
      clauses.push('category = ?');
      params.push(filter.category);
    }
    if (filter.source !== undefined) {
      clauses.push('source = ?');
      params.push(filter.source);
    }
    if (filter.notServedSince !== undefined) {
      clauses.push('(last_served IS NULL OR last_served < ?)');
      params.push(filter.notServedSince);
    }

    return {
      where: clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '',
      params
    };
  }

  private rowToEntry(row: InsightRow): CatalogEntry {
    const { number, category } = row;
    if (!isBankNumber(number) || !isInsightCategory(category)) {
      throw new CatalogError('read', `row ${row.id} has number ${number} and category "${category}"`);
    }
    return {
      id: row.id,
      number,
      category,
      text: row.text,
      source: row.source,
      position: row.position,
      createdAt: row.created_at,
      servedCount: row.served_count,
      lastServed: row.last_served ?? undefined
    };
  }
}
