/**
 * Sample data seeder for `your_table`.
 * Generates records with Faker.js.
 */

import { faker } from '@faker-js/faker';
import Database from 'better-sqlite3';
import { readFileSync } from 'fs';
import { z } from 'zod';

const SeedDataSchema = z.object({
  categories: z.record(z.array(z.string()).nonempty()),
  regions: z.array(z.string()).nonempty(),
});
export type SeedData = z.infer<typeof SeedDataSchema>;

const SEED_DATA_URL = new URL('../../data/seed-data.json', import.meta.url);

export function loadSeedData(url: URL = SEED_DATA_URL): SeedData {
  return SeedDataSchema.parse(JSON.parse(readFileSync(url, 'utf-8')));
}

export interface SeedRecord {
  date: string;
  year: number;
  month: number;
  day: number;
  category: string;
  sub_category: string;
  region: string;
  name: string;
  value: number;
  keywords: string;
}

export interface SeedOptions {
  rows: number;
  /** Faker seed for reproducible data. */
  seed?: number;
  /** Called after each batch with the number of rows written so far. */
  onProgress?: (completed: number) => void;
}

const BATCH_SIZE = 1000;

/**
 * Create `your_table`. Keep in step with SCHEMA_DESCRIPTION in
 * services/sql-generator.ts.
 */
export function createSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS your_table (
      id INTEGER PRIMARY KEY,
      date TEXT NOT NULL,
      year INTEGER NOT NULL,
      month INTEGER NOT NULL,
      day INTEGER NOT NULL,
      category TEXT NOT NULL,
      sub_category TEXT,
      region TEXT,
      name TEXT NOT NULL,
      value INTEGER NOT NULL DEFAULT 0,
      keywords TEXT
    );
    CREATE INDEX IF NOT EXISTS idx_your_table_date ON your_table(year, month, day);
    CREATE INDEX IF NOT EXISTS idx_your_table_category ON your_table(category);
    CREATE INDEX IF NOT EXISTS idx_your_table_region ON your_table(region);
  `);
}

const pad = (n: number): string => String(n).padStart(2, '0');

export function generateRecord(data: SeedData): SeedRecord {
  const when = faker.date.between({ from: '2023-01-01', to: '2024-12-31' });
  const category = faker.helpers.objectKey(data.categories);
  const subCategory = faker.helpers.arrayElement(data.categories[category]);
  const year = when.getFullYear();
  const month = when.getMonth() + 1;
  const day = when.getDate();

  return {
    date: `${year}-${pad(month)}-${pad(day)} ${pad(when.getHours())}:${pad(when.getMinutes())}`,
    year,
    month,
    day,
    category,
    sub_category: subCategory,
    region: faker.helpers.arrayElement(data.regions),
    name: faker.commerce.productName(),
    value: faker.number.int({ min: 1, max: 1000 }),
    keywords: JSON.stringify([category, subCategory, faker.word.noun()]),
  };
}

/**
 * Create the table and append `rows` generated records.
 *
 * @returns the table's row count afterwards
 */
export function seedDatabase(dbPath: string, options: SeedOptions): number {
  if (options.seed !== undefined) {
    faker.seed(options.seed);
  }
  const data = loadSeedData();

  const db = new Database(dbPath);
  try {
    db.pragma('journal_mode = WAL');
    createSchema(db);

    const insert = db.prepare(`
      INSERT INTO your_table (date, year, month, day, category, sub_category, region, name, value, keywords)
      VALUES (@date, @year, @month, @day, @category, @sub_category, @region, @name, @value, @keywords)
    `);
    const insertBatch = db.transaction((records: SeedRecord[]) => {
      for (const record of records) {
        insert.run(record);
      }
    });

    let completed = 0;
    while (completed < options.rows) {
      const size = Math.min(BATCH_SIZE, options.rows - completed);
      insertBatch(Array.from({ length: size }, () => generateRecord(data)));
      completed += size;
      options.onProgress?.(completed);
    }

    const total = db.prepare('SELECT COUNT(*) AS total FROM your_table').pluck().get();
    return typeof total === 'number' ? total : 0;
  } finally {
    db.close();
  }
}
