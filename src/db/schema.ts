/**
 * Key-value store schema. `gnd.id` is deliberately not unique: the dump may
 * repeat an identifier and every occurrence is kept.
 */
export const SCHEMA_SQL = `
CREATE TABLE gnd (id TEXT, content BLOB);
CREATE INDEX IF NOT EXISTS idx_gnd_id ON gnd (id);
`;
