/**
 * backend/src/modules/resources/resource.types.ts
 *
 * Domain types for the generic resource collection guarded by the auth core.
 */

import type { JsonObject } from '../../shared/json';

export type ResourceId = string;

export type Resource = {
  id: ResourceId;
  name: string;
  data: JsonObject | null;
};

export type ResourceInput = {
  name: string;
  data: JsonObject | null;
};

export type ResourcePatch = Partial<ResourceInput>;

export const RESOURCE_ORDER_FIELDS = ['id', 'name'] as const;
type ResourceOrderField = (typeof RESOURCE_ORDER_FIELDS)[number];

export type ResourceOrder = {
  field: ResourceOrderField;
  direction: 'asc' | 'desc';
};

export type ResourceListQuery = {
  q: string | null;
  skip: number;
  size: number;
  order: ResourceOrder[];
};
