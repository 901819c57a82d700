export const CACHE_SCHEMA_VERSION = 1;

export const CREATE_CACHE_TABLES_SQL = `
CREATE TABLE IF NOT EXISTS embedding_cache (
  contentHash TEXT NOT NULL,
  modelId TEXT NOT NULL,
  dims INTEGER NOT NULL,
  vector BLOB NOT NULL,
  createdAt INTEGER NOT NULL,
  PRIMARY KEY (contentHash, modelId)
);

CREATE TABLE IF NOT EXISTS cache_meta (
  key TEXT PRIMARY KEY NOT NULL,
  value TEXT NOT NULL
);
`;
