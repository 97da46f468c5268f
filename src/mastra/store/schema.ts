/**
 * Receipt table layout
 *
 * `seq` records insertion order (tie-breaker for searches);
 * `receipt_id` is the unique dedup key and the id in the vector index.
 * Times are epoch milliseconds (UTC); items are a JSON array.
 */

export const CREATE_RECEIPTS_TABLE = `
CREATE TABLE IF NOT EXISTS receipts (
  seq               INTEGER PRIMARY KEY AUTOINCREMENT,
  receipt_id        TEXT    NOT NULL UNIQUE,
  store_name        TEXT    NOT NULL,
  transaction_time  INTEGER NOT NULL,
  total_amount      REAL    NOT NULL CHECK (total_amount >= 0),
  currency          TEXT    NOT NULL,
  purchased_items   TEXT    NOT NULL,
  image_uri         TEXT    NOT NULL,
  created_at        INTEGER NOT NULL
)`;

export const CREATE_RECEIPTS_RANGE_INDEX = `
CREATE INDEX IF NOT EXISTS idx_receipts_time_amount
  ON receipts (transaction_time, total_amount)`;
