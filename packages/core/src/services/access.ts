import { AccessDeniedError, NotFoundError } from '../errors.js';
import type { HierarchyStore } from '../repository/types.js';
import type { Item, Project, Specification } from '../types/index.js';

/**
 * Resolves a resource through its parents up to the owning project and
 * checks that the caller owns it. Missing resources are NotFoundError,
 * foreign ones AccessDeniedError.
 */
export class AccessGuard {
  constructor(private readonly store: HierarchyStore) {}

  async project(ownerId: string, projectId: number): Promise<Project> {
    const project = await this.store.projects.findById(projectId);
    if (!project) {
      throw new NotFoundError('Project', projectId);
    }
    if (project.ownerId !== ownerId) {
      throw new AccessDeniedError();
    }
    return project;
  }

  async specification(ownerId: string, specId: number): Promise<Specification> {
    const specification = await this.store.specifications.getChild(specId);
    if (!specification) {
      throw new NotFoundError('Specification', specId);
    }
    await this.project(ownerId, specification.projectId);
    return specification;
  }

  async item(ownerId: string, itemId: number): Promise<Item> {
    const item = await this.store.items.getChild(itemId);
    if (!item) {
      throw new NotFoundError('Item', itemId);
    }
    await this.specification(ownerId, item.specId);
    return item;
  }
}
