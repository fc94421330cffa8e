/**
 * Deckhand Inventory Store
 *
 * Owns the loaded inventory file. Mutation batches run one at a time; each
 * successful batch is rendered and written atomically before it becomes the
 * current inventory, so a failed batch or a failed write changes nothing.
 */

import pLimit from 'p-limit'
import {
  addHost,
  listHosts,
  parseInventory,
  removeHost,
  renderInventory,
  updateHost,
  type HostRecord,
  type HostVarsPatch,
  type Inventory
} from '../domain/inventory.js'
import { readTextFile, writeFileAtomic } from './fs-store.js'
import { silentLogger, type Logger } from './logger.js'

export interface InventoryStoreOptions {
  /** Inventory file, e.g. ansible/inventory/hosts.ini */
  path: string
  logger?: Logger
}

export type InventoryMutation = (inventory: Inventory) => Inventory

export class InventoryStore {
  readonly path: string
  private readonly logger: Logger
  private readonly queue = pLimit(1)
  private inventory: Inventory

  private constructor(options: InventoryStoreOptions, inventory: Inventory) {
    this.path = options.path
    this.logger = options.logger ?? silentLogger
    this.inventory = inventory
  }

  /**
   * Load the inventory file; a missing file is an empty inventory
   *
   * @throws MalformedInventoryError
   */
  static async open(options: InventoryStoreOptions): Promise<InventoryStore> {
    const text = await readTextFile(options.path)
    return new InventoryStore(options, parseInventory(text ?? ''))
  }

  current(): Inventory {
    return this.inventory
  }

  render(): string {
    return renderInventory(this.inventory)
  }

  listHosts(group?: string): HostRecord[] {
    return listHosts(this.inventory, group)
  }

  /**
   * Re-read the file, dropping the in-memory copy
   */
  reload(): Promise<Inventory> {
    return this.queue(async () => {
      const text = await readTextFile(this.path)
      this.inventory = parseInventory(text ?? '')
      return this.inventory
    })
  }

  /**
   * Apply a batch of mutations and persist the result
   *
   * @throws whatever a mutation throws, or PersistFailureError
   */
  update(...mutations: InventoryMutation[]): Promise<Inventory> {
    return this.queue(async () => {
      const next = mutations.reduce((inventory, mutate) => mutate(inventory), this.inventory)
      if (next === this.inventory) {
        return next
      }
      await writeFileAtomic(this.path, renderInventory(next))
      this.inventory = next
      this.logger.debug(`wrote ${this.path}`)
      return next
    })
  }

  addHost(group: string, host: string, vars: Record<string, string> = {}): Promise<Inventory> {
    return this.update(inventory => addHost(inventory, group, host, vars))
  }

  removeHost(group: string, host: string): Promise<Inventory> {
    return this.update(inventory => removeHost(inventory, group, host))
  }

  updateHost(group: string, host: string, patch: HostVarsPatch): Promise<Inventory> {
    return this.update(inventory => updateHost(inventory, group, host, patch))
  }
}
