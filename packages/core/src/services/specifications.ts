import type { CacheObserver, ListingCache } from '../cache/listing-cache.js';
import { scoped } from '../logger.js';
import type { HierarchyStore } from '../repository/types.js';
import type { OrderMove, Specification } from '../types/index.js';
import type { ChildCreateInput } from '../validation/schemas.js';
import type { AccessGuard } from './access.js';

const log = scoped('specifications');

export class SpecificationService {
  constructor(
    private readonly store: HierarchyStore,
    private readonly cache: ListingCache,
    private readonly access: AccessGuard
  ) {}

  async list(ownerId: string, projectId: number, observe?: CacheObserver): Promise<Specification[]> {
    await this.access.project(ownerId, projectId);
    return this.cache.specifications(projectId, () => this.store.specifications.listChildren(projectId), observe);
  }

  async create(ownerId: string, projectId: number, input: ChildCreateInput): Promise<Specification> {
    await this.access.project(ownerId, projectId);
    const specification = await this.store.specifications.createChild(projectId, input.content, input.position);
    await this.cache.invalidateSpecifications(projectId);
    log.info('created specification', { id: specification.id, projectId, orderIndex: specification.orderIndex });
    return specification;
  }

  async move(ownerId: string, specId: number, targetIndex: number): Promise<Specification[]> {
    const specification = await this.access.specification(ownerId, specId);
    const ordered = await this.store.specifications.moveChild(specId, targetIndex);
    await this.cache.invalidateSpecifications(specification.projectId);
    log.info('moved specification', { id: specId, to: targetIndex });
    return ordered;
  }

  async reorder(ownerId: string, projectId: number, moves: readonly OrderMove[]): Promise<Specification[]> {
    await this.access.project(ownerId, projectId);
    const ordered = await this.store.specifications.reorderChildren(projectId, moves);
    await this.cache.invalidateSpecifications(projectId);
    log.info('reordered specifications', { projectId, count: ordered.length });
    return ordered;
  }

  async remove(ownerId: string, specId: number): Promise<void> {
    await this.access.specification(ownerId, specId);
    const projectId = await this.store.specifications.deleteChild(specId);
    await this.cache.invalidateSpecifications(projectId, [specId]);
    log.info('deleted specification', { id: specId, projectId });
  }
}
