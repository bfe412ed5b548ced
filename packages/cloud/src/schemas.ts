/**
 * Cloud store response schemas
 */

import { z } from 'zod';

const idSchema = z.union([z.string().min(1), z.number()]).transform(String);

export const deviceCodeSchema = z
  .object({
    device_code: z.string().min(1),
    user_code: z.string().min(1),
    verification_uri: z.string().optional(),
    // Some deployments use the older name
    verification_url: z.string().optional(),
    expires_in: z.coerce.number().positive().default(900),
    interval: z.coerce.number().positive().default(5),
  })
  .refine((data) => Boolean(data.verification_uri ?? data.verification_url), {
    message: 'verification_uri is missing',
    path: ['verification_uri'],
  });

export const tokenSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().nullish(),
  expires_in: z.coerce.number().positive().default(3600),
});

export const oauthErrorSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

export const taskSchema = z
  .object({
    id: idSchema,
    name: z.string().nullish(),
    title: z.string().nullish(),
    status: z.string().nullish(),
    progress: z.coerce.number().nullish(),
    size: z.coerce.number().nullish(),
    message: z.string().nullish(),
  })
  .passthrough();

export const taskListSchema = z.union([
  z.array(taskSchema),
  z.object({ tasks: z.array(taskSchema) }).transform((data) => data.tasks),
]);

const contentItemSchema = z.object({
  id: idSchema,
  name: z.string(),
  size: z.coerce.number().nullish(),
  type: z.enum(['file', 'folder']).optional(),
  url: z.string().nullish(),
});

export type ContentItem = z.infer<typeof contentItemSchema>;

export const contentsSchema = z.union([
  z.array(contentItemSchema),
  z
    .object({
      folders: z.array(contentItemSchema).default([]),
      files: z.array(contentItemSchema).default([]),
    })
    .transform((data): ContentItem[] => [
      ...data.folders.map((folder) => ({ ...folder, type: 'folder' as const })),
      ...data.files.map((file) => ({ ...file, type: 'file' as const })),
    ]),
]);

export const fileUrlSchema = z.object({ url: z.string().min(1) });

export const archiveInitSchema = z.object({ uniq: z.string().min(1) });

export const archiveStatusSchema = z.object({
  status: z.string(),
  url: z.string().optional(),
  progress: z.coerce.number().optional(),
});

export const submitResponseSchema = z
  .object({
    success: z.boolean().optional(),
    task_id: idSchema.optional(),
    id: idSchema.optional(),
    user_torrent_id: idSchema.optional(),
    torrent_hash: z.string().optional(),
    reason_phrase: z.string().optional(),
    message: z.string().optional(),
    wt: z.object({ id: idSchema }).partial().optional(),
  })
  .passthrough();

export type SubmitResponse = z.infer<typeof submitResponseSchema>;

export const accountSchema = z
  .object({
    username: z.string().optional(),
    email: z.string().optional(),
    space_used: z.coerce.number().optional(),
    space_max: z.coerce.number().optional(),
    is_premium: z.union([z.boolean(), z.number()]).optional(),
  })
  .passthrough();
