import { Router, Request, Response } from 'express'
import type { SaleLedger } from '../../features/sales/saleLedger'
import { NotFoundError } from '../../utils/errors'
import { dateRangeSchema, parseId, parseInput } from '../validation'

export function createSalesRouter(ledger: SaleLedger): Router {
  const router = Router()

  // GET /api/sales?from=YYYY-MM-DD&to=YYYY-MM-DD
  router.get('/', (req: Request, res: Response) => {
    const range = parseInput(dateRangeSchema, req.query)
    res.json({ success: true, data: ledger.listSales(range) })
  })

  // GET /api/sales/daily — per-day transaction count and revenue
  router.get('/daily', (req: Request, res: Response) => {
    const range = parseInput(dateRangeSchema, req.query)
    res.json({ success: true, data: ledger.aggregateByDate(range) })
  })

  // GET /api/sales/summary
  router.get('/summary', (req: Request, res: Response) => {
    const range = parseInput(dateRangeSchema, req.query)
    res.json({ success: true, data: ledger.salesSummary(range) })
  })

  // GET /api/sales/:id
  router.get('/:id', (req: Request, res: Response) => {
    const id = parseId(req.params.id)
    const details = ledger.getSaleDetails(id)
    if (!details) throw new NotFoundError('sale', id)
    res.json({ success: true, data: details })
  })

  return router
}
