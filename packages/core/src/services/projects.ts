import type { CacheObserver, ListingCache } from '../cache/listing-cache.js';
import { scoped } from '../logger.js';
import type { HierarchyStore } from '../repository/types.js';
import type { Project, ProjectListQuery, ProjectPage } from '../types/index.js';
import type { AccessGuard } from './access.js';

const log = scoped('projects');

export class ProjectService {
  constructor(
    private readonly store: HierarchyStore,
    private readonly cache: ListingCache,
    private readonly access: AccessGuard
  ) {}

  list(ownerId: string, query: ProjectListQuery, observe?: CacheObserver): Promise<ProjectPage> {
    return this.cache.projects(ownerId, query, () => this.store.projects.listByOwner(ownerId, query), observe);
  }

  get(ownerId: string, projectId: number): Promise<Project> {
    return this.access.project(ownerId, projectId);
  }

  async create(ownerId: string, title: string): Promise<Project> {
    const project = await this.store.projects.create(ownerId, title);
    await this.cache.invalidateProjects(ownerId);
    log.info('created project', { id: project.id, owner: ownerId });
    return project;
  }

  async update(ownerId: string, projectId: number, title: string): Promise<Project> {
    await this.access.project(ownerId, projectId);
    const project = await this.store.projects.updateTitle(projectId, title);
    await this.cache.invalidateProjects(ownerId);
    log.info('renamed project', { id: projectId });
    return project;
  }

  async remove(ownerId: string, projectId: number): Promise<void> {
    await this.access.project(ownerId, projectId);
    const specIds = (await this.store.specifications.listChildren(projectId)).map((spec) => spec.id);
    await this.store.projects.delete(projectId);
    await this.cache.invalidateProjects(ownerId, { projectId, specIds });
    log.info('deleted project', { id: projectId, specifications: specIds.length });
  }
}
