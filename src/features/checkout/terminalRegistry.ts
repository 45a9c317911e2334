import { v4 as uuidv4 } from 'uuid'
import type { Logger } from '../../utils/logger'
import type { CatalogStore } from '../catalog/catalogStore'
import type { SaleLedger } from '../sales/saleLedger'
import { CheckoutEngine, CheckoutState } from './checkoutEngine'
import { NotFoundError } from '../../utils/errors'

export type TerminalInfo = {
  id: string
  openedAt: string
  lastUsedAt: string
  lines: number
  state: CheckoutState
}

type Terminal = {
  engine: CheckoutEngine
  openedAt: number
  lastUsedAt: number
}

/**
 * One checkout engine, with its own cart, per till terminal. Terminals that
 * are never closed are reclaimed by {@link TerminalRegistry.closeIdle}.
 */
export class TerminalRegistry {
  private readonly terminals = new Map<string, Terminal>()

  constructor(
    private readonly catalog: CatalogStore,
    private readonly ledger: SaleLedger,
    private readonly logger: Logger,
    private readonly now: () => number = Date.now,
  ) {}

  open(): string {
    const id = uuidv4()
    const engine = new CheckoutEngine({
      catalog: this.catalog,
      ledger: this.ledger,
      logger: this.logger.child({ terminal: id }),
    })
    const openedAt = this.now()
    this.terminals.set(id, { engine, openedAt, lastUsedAt: openedAt })
    this.logger.info('Terminal opened', { terminal: id })
    return id
  }

  /** Looks up a terminal and marks it as in use */
  get(id: string): CheckoutEngine {
    const terminal = this.terminals.get(id)
    if (!terminal) throw new NotFoundError('terminal', id)
    terminal.lastUsedAt = this.now()
    return terminal.engine
  }

  close(id: string): boolean {
    const closed = this.terminals.delete(id)
    if (closed) this.logger.info('Terminal closed', { terminal: id })
    return closed
  }

  /** Drops terminals untouched for longer than maxIdleMs, abandoning their carts */
  closeIdle(maxIdleMs: number): string[] {
    const cutoff = this.now() - maxIdleMs
    const closed: string[] = []
    for (const [id, terminal] of this.terminals) {
      if (terminal.lastUsedAt < cutoff) {
        this.terminals.delete(id)
        closed.push(id)
      }
    }
    if (closed.length) this.logger.info('Idle terminals closed', { count: closed.length })
    return closed
  }

  list(): TerminalInfo[] {
    return [...this.terminals.entries()].map(([id, { engine, openedAt, lastUsedAt }]) => ({
      id,
      openedAt: new Date(openedAt).toISOString(),
      lastUsedAt: new Date(lastUsedAt).toISOString(),
      lines: engine.cart.size,
      state: engine.state,
    }))
  }
}
