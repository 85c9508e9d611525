import type BetterSqlite3 from 'better-sqlite3';

const baseStatements = [
  `CREATE TABLE IF NOT EXISTS extractions (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    source TEXT,
    verdict TEXT NOT NULL,
    computed_total INTEGER NOT NULL,
    reported_total INTEGER,
    difference INTEGER,
    total_item_count INTEGER NOT NULL,
    deduplicated_item_count INTEGER NOT NULL,
    token_usage_json TEXT,
    response_json TEXT NOT NULL,
    created_at TEXT DEFAULT CURRENT_TIMESTAMP
  );`,
  `CREATE TABLE IF NOT EXISTS extraction_line_items (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    extraction_id INTEGER NOT NULL,
    page_index INTEGER NOT NULL,
    item_index INTEGER NOT NULL,
    description TEXT,
    quantity REAL,
    unit_price INTEGER,
    line_total INTEGER,
    flags TEXT,
    FOREIGN KEY (extraction_id) REFERENCES extractions(id) ON DELETE CASCADE
  );`,
  `CREATE INDEX IF NOT EXISTS idx_extraction_line_items_extraction
    ON extraction_line_items (extraction_id);`,
];

export const applyMigrations = (db: BetterSqlite3.Database): void => {
  baseStatements.forEach((statement) => {
    db.prepare(statement).run();
  });
};
