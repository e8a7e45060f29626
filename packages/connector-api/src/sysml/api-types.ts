/**
 * Shapes of the SysML v2 API resources the client reads
 */

import { z } from 'zod';

const identifiedSchema = z.object({ '@id': z.string().min(1) });

export const projectSchema = z.object({
  '@id': z.string().min(1),
  name: z.string(),
  description: z.string().nullish(),
  created: z.string().optional(),
  defaultBranch: identifiedSchema.nullish(),
});

export const branchSchema = z.object({
  '@id': z.string().min(1),
  name: z.string(),
  created: z.string().optional(),
  head: identifiedSchema.nullish(),
  owningProject: identifiedSchema.optional(),
  referencedCommit: identifiedSchema.nullish(),
});

export type Project = z.infer<typeof projectSchema>;
export type Branch = z.infer<typeof branchSchema>;
