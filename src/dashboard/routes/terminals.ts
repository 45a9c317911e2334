import { Router, Request, Response } from 'express'
import type { TerminalRegistry } from '../../features/checkout/terminalRegistry'
import type { CheckoutEngine } from '../../features/checkout/checkoutEngine'
import {
  checkoutSchema,
  discountQuerySchema,
  parseId,
  parseInput,
  quantitySchema,
  scanSchema,
} from '../validation'

function cartView(engine: CheckoutEngine, discount = 0) {
  return {
    items: engine.cart.items(),
    ...engine.computeTotals(discount),
    state: engine.state,
  }
}

export function createTerminalsRouter(terminals: TerminalRegistry): Router {
  const router = Router()

  // POST /api/terminals — open a till session with an empty cart
  router.post('/', (_req: Request, res: Response) => {
    const id = terminals.open()
    res.status(201).json({ success: true, data: { id } })
  })

  // GET /api/terminals
  router.get('/', (_req: Request, res: Response) => {
    res.json({ success: true, data: terminals.list() })
  })

  // DELETE /api/terminals/:id
  router.delete('/:id', (req: Request, res: Response) => {
    res.json({ success: true, data: { closed: terminals.close(req.params.id) } })
  })

  // GET /api/terminals/:id/cart?discount=
  router.get('/:id/cart', (req: Request, res: Response) => {
    const engine = terminals.get(req.params.id)
    const { discount } = parseInput(discountQuerySchema, req.query)
    res.json({ success: true, data: cartView(engine, discount) })
  })

  // POST /api/terminals/:id/cart/items — scan a barcode
  router.post('/:id/cart/items', (req: Request, res: Response) => {
    const engine = terminals.get(req.params.id)
    const { barcode, quantity } = parseInput(scanSchema, req.body)
    const line = engine.scanAndAdd(barcode, quantity)
    res.status(201).json({ success: true, data: { line, cart: cartView(engine) } })
  })

  // PATCH /api/terminals/:id/cart/items/:productId
  router.patch('/:id/cart/items/:productId', (req: Request, res: Response) => {
    const engine = terminals.get(req.params.id)
    const { quantity } = parseInput(quantitySchema, req.body)
    const line = engine.changeQuantity(parseId(req.params.productId, 'productId'), quantity)
    res.json({ success: true, data: { line, cart: cartView(engine) } })
  })

  // DELETE /api/terminals/:id/cart/items/:productId
  router.delete('/:id/cart/items/:productId', (req: Request, res: Response) => {
    const engine = terminals.get(req.params.id)
    const removed = engine.removeItem(parseId(req.params.productId, 'productId'))
    res.json({ success: true, data: { removed, cart: cartView(engine) } })
  })

  // DELETE /api/terminals/:id/cart — cancel the transaction
  router.delete('/:id/cart', (req: Request, res: Response) => {
    const engine = terminals.get(req.params.id)
    engine.cancel()
    res.json({ success: true, data: cartView(engine) })
  })

  // POST /api/terminals/:id/checkout
  router.post('/:id/checkout', (req: Request, res: Response) => {
    const engine = terminals.get(req.params.id)
    const { discount } = parseInput(checkoutSchema, req.body ?? {})
    const receipt = engine.checkout(discount)
    res.status(201).json({ success: true, data: receipt })
  })

  return router
}
