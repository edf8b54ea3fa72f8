import type { CacheObserver, ListingCache } from '../cache/listing-cache.js';
import { scoped } from '../logger.js';
import type { HierarchyStore } from '../repository/types.js';
import type { Item, OrderMove } from '../types/index.js';
import type { ChildCreateInput } from '../validation/schemas.js';
import type { AccessGuard } from './access.js';

const log = scoped('items');

export class ItemService {
  constructor(
    private readonly store: HierarchyStore,
    private readonly cache: ListingCache,
    private readonly access: AccessGuard
  ) {}

  async list(ownerId: string, specId: number, observe?: CacheObserver): Promise<Item[]> {
    await this.access.specification(ownerId, specId);
    return this.cache.items(specId, () => this.store.items.listChildren(specId), observe);
  }

  async create(ownerId: string, specId: number, input: ChildCreateInput): Promise<Item> {
    await this.access.specification(ownerId, specId);
    const item = await this.store.items.createChild(specId, input.content, input.position);
    await this.cache.invalidateItems(specId);
    log.info('created item', { id: item.id, specId, orderIndex: item.orderIndex });
    return item;
  }

  async update(ownerId: string, itemId: number, content: string): Promise<Item> {
    await this.access.item(ownerId, itemId);
    const item = await this.store.items.updateChildContent(itemId, content);
    await this.cache.invalidateItems(item.specId);
    log.info('updated item', { id: itemId });
    return item;
  }

  async reorder(ownerId: string, specId: number, moves: readonly OrderMove[]): Promise<Item[]> {
    await this.access.specification(ownerId, specId);
    const ordered = await this.store.items.reorderChildren(specId, moves);
    await this.cache.invalidateItems(specId);
    log.info('reordered items', { specId, count: ordered.length });
    return ordered;
  }

  async remove(ownerId: string, itemId: number): Promise<void> {
    await this.access.item(ownerId, itemId);
    const specId = await this.store.items.deleteChild(itemId);
    await this.cache.invalidateItems(specId);
    log.info('deleted item', { id: itemId, specId });
  }
}
