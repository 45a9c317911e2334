export const SCHEMA_SQL = `
-- ============================================================
-- Point of Sale — Database Schema
-- ============================================================

-- Catalog
CREATE TABLE IF NOT EXISTS products (
  id        INTEGER PRIMARY KEY AUTOINCREMENT,
  barcode   TEXT UNIQUE NOT NULL,
  name      TEXT NOT NULL,
  price     REAL NOT NULL CHECK (price >= 0),
  stock     INTEGER NOT NULL DEFAULT 0 CHECK (stock >= 0)
);

-- Sale headers (append-only)
CREATE TABLE IF NOT EXISTS sales (
  id        INTEGER PRIMARY KEY AUTOINCREMENT,
  timestamp TEXT NOT NULL,
  total     REAL NOT NULL CHECK (total >= 0)
);
CREATE INDEX IF NOT EXISTS idx_sales_timestamp ON sales(timestamp DESC);

-- Sale line items. product_id has no foreign key: sale history outlives
-- the product row.
CREATE TABLE IF NOT EXISTS sale_items (
  id           INTEGER PRIMARY KEY AUTOINCREMENT,
  sale_id      INTEGER NOT NULL,
  product_id   INTEGER NOT NULL,
  product_name TEXT NOT NULL,
  quantity     INTEGER NOT NULL CHECK (quantity > 0),
  unit_price   REAL NOT NULL,
  line_total   REAL NOT NULL,
  FOREIGN KEY (sale_id) REFERENCES sales(id)
);
CREATE INDEX IF NOT EXISTS idx_sale_items_sale ON sale_items(sale_id);
`
