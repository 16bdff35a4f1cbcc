/**
 * Schema for the SQLite state store: one row per persisted state document.
 */
export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS state_documents (
  name TEXT PRIMARY KEY,
  body TEXT NOT NULL,
  updated_at TEXT NOT NULL
);
`;
