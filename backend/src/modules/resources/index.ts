/**
 * backend/src/modules/resources/index.ts
 *
 * Public surface of the resources module.
 */

export { KyselyResourceStore } from './dal/kysely-resource.store';
export type { ResourceStore } from './resource.store';
export type { Resource, ResourceListQuery } from './resource.types';
