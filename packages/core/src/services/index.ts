export { AccessGuard } from './access.js';
export { ProjectService } from './projects.js';
export { SpecificationService } from './specifications.js';
export { ItemService } from './items.js';
export { UserService } from './users.js';
export type { AuthenticationResult } from './users.js';
