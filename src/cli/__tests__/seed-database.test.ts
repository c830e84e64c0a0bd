import { afterEach, describe, it, expect } from 'vitest';
import Database from 'better-sqlite3';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { generateRecord, loadSeedData, seedDatabase } from '../seed-database.js';

describe('seed data', () => {
  it('loads categories and regions', () => {
    const data = loadSeedData();
    expect(Object.keys(data.categories)).toContain('sales');
    expect(data.regions).toContain('Seoul');
  });

  it('generates consistent date columns', () => {
    const data = loadSeedData();
    const record = generateRecord(data);

    const [datePart] = record.date.split(' ');
    expect(datePart).toBe(
      `${record.year}-${String(record.month).padStart(2, '0')}-${String(record.day).padStart(2, '0')}`
    );
    expect(data.categories[record.category]).toContain(record.sub_category);
    expect(JSON.parse(record.keywords)).toHaveLength(3);
  });
});

describe('seedDatabase', () => {
  let dir: string | null = null;

  afterEach(() => {
    if (dir) {
      rmSync(dir, { recursive: true, force: true });
      dir = null;
    }
  });

  it('creates your_table and reports progress per batch', () => {
    dir = mkdtempSync(join(tmpdir(), 'sqlchat-seed-'));
    const path = join(dir, 'seed.db');
    const progress: number[] = [];

    const total = seedDatabase(path, { rows: 1500, seed: 7, onProgress: (n) => progress.push(n) });

    expect(total).toBe(1500);
    expect(progress).toEqual([1000, 1500]);

    const db = new Database(path, { readonly: true });
    try {
      const columns = db
        .prepare('SELECT name FROM pragma_table_info(?)')
        .pluck()
        .all('your_table');
      expect(columns).toEqual([
        'id', 'date', 'year', 'month', 'day', 'category',
        'sub_category', 'region', 'name', 'value', 'keywords',
      ]);
    } finally {
      db.close();
    }
  });

  it('appends to an existing table', () => {
    dir = mkdtempSync(join(tmpdir(), 'sqlchat-seed-'));
    const path = join(dir, 'seed.db');

    seedDatabase(path, { rows: 10 });
    expect(seedDatabase(path, { rows: 5 })).toBe(15);
  });
});
