/**
 * Library manager response schemas (v3 API)
 */

import { z } from 'zod';

export const seriesSchema = z
  .object({
    id: z.number().int(),
    title: z.string(),
    path: z.string().optional(),
    year: z.number().optional(),
  })
  .passthrough();

export const seriesListSchema = z.array(seriesSchema);

export const rootFolderSchema = z
  .object({
    id: z.number().int(),
    path: z.string(),
    freeSpace: z.number().nullish(),
    accessible: z.boolean().optional(),
  })
  .passthrough();

export const rootFolderListSchema = z.array(rootFolderSchema);

export const commandSchema = z
  .object({
    id: z.number().int(),
    name: z.string().optional(),
    status: z.string().default('queued'),
  })
  .passthrough();
