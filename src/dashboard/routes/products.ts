import { Router, Request, Response } from 'express'
import type { CatalogStore } from '../../features/catalog/catalogStore'
import { NotFoundError } from '../../utils/errors'
import {
  parseId,
  parseInput,
  productCreateSchema,
  productImportSchema,
  productUpdateSchema,
  restockSchema,
  thresholdSchema,
} from '../validation'

export function createProductsRouter(catalog: CatalogStore, defaultThreshold: number): Router {
  const router = Router()

  // GET /api/products — everything, or ?q= keyword search
  router.get('/', (req: Request, res: Response) => {
    const q = typeof req.query.q === 'string' ? req.query.q.trim() : ''
    res.json({ success: true, data: q ? catalog.searchByKeyword(q) : catalog.listAll() })
  })

  // GET /api/products/low-stock?threshold=
  router.get('/low-stock', (req: Request, res: Response) => {
    const { threshold } = parseInput(thresholdSchema, req.query)
    res.json({ success: true, data: catalog.lowStock(threshold ?? defaultThreshold) })
  })

  // GET /api/products/summary?threshold=
  router.get('/summary', (req: Request, res: Response) => {
    const { threshold } = parseInput(thresholdSchema, req.query)
    res.json({ success: true, data: catalog.inventorySummary(threshold ?? defaultThreshold) })
  })

  // GET /api/products/barcode/:barcode
  router.get('/barcode/:barcode', (req: Request, res: Response) => {
    const product = catalog.getByBarcode(req.params.barcode)
    if (!product) throw new NotFoundError('product', req.params.barcode)
    res.json({ success: true, data: product })
  })

  // GET /api/products/:id
  router.get('/:id', (req: Request, res: Response) => {
    res.json({ success: true, data: catalog.requireById(parseId(req.params.id)) })
  })

  // POST /api/products
  router.post('/', (req: Request, res: Response) => {
    const input = parseInput(productCreateSchema, req.body)
    const id = catalog.addProduct(input)
    res.status(201).json({ success: true, data: catalog.requireById(id) })
  })

  // POST /api/products/import — upsert by barcode, all or nothing
  router.post('/import', (req: Request, res: Response) => {
    const { products } = parseInput(productImportSchema, req.body)
    res.json({ success: true, data: catalog.importProducts(products) })
  })

  // PUT /api/products/:id — replaces name, price and stock
  router.put('/:id', (req: Request, res: Response) => {
    const fields = parseInput(productUpdateSchema, req.body)
    res.json({ success: true, data: catalog.updateProduct(parseId(req.params.id), fields) })
  })

  // POST /api/products/:id/restock
  router.post('/:id/restock', (req: Request, res: Response) => {
    const id = parseId(req.params.id)
    const { quantity } = parseInput(restockSchema, req.body)
    const stock = catalog.restock(id, quantity)
    res.json({ success: true, data: { id, stock } })
  })

  // DELETE /api/products/:id — sale history keeps its reference
  router.delete('/:id', (req: Request, res: Response) => {
    const deleted = catalog.deleteProduct(parseId(req.params.id))
    res.json({ success: true, data: { deleted } })
  })

  return router
}
