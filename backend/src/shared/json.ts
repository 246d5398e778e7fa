/**
 * backend/src/shared/json.ts
 *
 * Free-form JSON payloads (`data` columns on users and resources).
 */

import { z } from 'zod';

export type JsonObject = { [key: string]: unknown };

export const jsonObjectSchema: z.ZodType<JsonObject> = z.record(z.string(), z.unknown());
