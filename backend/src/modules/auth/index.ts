/**
 * backend/src/modules/auth/index.ts
 *
 * Public surface of the auth module for other modules.
 */

export type { Denial } from './guard/access-guard.types';
export type { AccessGuardFactory } from './guard/access-guard';
