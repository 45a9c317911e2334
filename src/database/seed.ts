/**
 * Seed the catalog with sample products.
 * Run: npm run seed
 */
import { config } from '../config'
import { openDatabase } from './db'
import { createLogger } from '../utils/logger'
import { CatalogStore, NewProduct } from '../features/catalog/catalogStore'

const SAMPLE_PRODUCTS: NewProduct[] = [
  { barcode: 'SKU-1001', name: 'Ballpoint Pen (Blue)', price: 1.49, stock: 120 },
  { barcode: 'SKU-1002', name: 'Sparkling Water 500ml', price: 0.99, stock: 48 },
  { barcode: 'SKU-1003', name: 'Milk Chocolate Bar', price: 2.25, stock: 60 },
  { barcode: 'SKU-1004', name: 'AA Batteries (4 pack)', price: 5.99, stock: 25 },
  { barcode: 'SKU-1005', name: 'Pocket Notebook', price: 3.5, stock: 8 },
  { barcode: 'SKU-1006', name: 'Reusable Shopping Bag', price: 0.5, stock: 200 },
  { barcode: 'SKU-1007', name: 'Cola 330ml Can', price: 1.1, stock: 96 },
  { barcode: 'SKU-1008', name: 'Lighter', price: 1.99, stock: 4 },
]

const logger = createLogger({ level: config.log.level, dir: config.log.dir, nodeEnv: config.server.nodeEnv })
const db = openDatabase(config.db.path, logger)

try {
  const catalog = new CatalogStore(db, logger)
  const result = catalog.importProducts(SAMPLE_PRODUCTS)
  logger.info('Seed complete', { ...result })
} finally {
  db.close()
}
