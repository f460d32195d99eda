import { z } from 'zod';
import { isValidVersion } from './semver.js';

export const visibilityScopeSchema = z.enum(['private', 'team', 'organization', 'global']);

export const versionSchema = z
  .string()
  .refine(isValidVersion, { message: 'Version must be major.minor.patch' });

export const skillSchema = z.object({
  skillId: z.string().min(1),
  title: z.string().min(1),
  description: z.string().default(''),
  category: z.string().default('general'),
  tags: z.array(z.string()).default([]).transform(tags => [...new Set(tags)]),
  version: versionSchema.default('1.0.0'),
  embedding: z.array(z.number()).nullable().default(null),
  visibilityScope: visibilityScopeSchema.default('organization'),
  usageCount: z.number().int().nonnegative().default(0),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date().optional(),
  content: z.string().optional(),
  maintainer: z.string().optional(),
  changelogUrl: z.string().optional(),
  installUrl: z.string().optional(),
});

export const installationSchema = z.object({
  userId: z.string().min(1),
  skillId: z.string().min(1),
  installedVersion: z.string(),
  lastCheckTimestamp: z.coerce.date(),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
});

export const installedSkillRefSchema = z.object({
  skillId: z.string().min(1),
  version: z.string(),
});

export const updatesRequestSchema = z.object({
  userId: z.string().min(1),
  installedSkills: z.array(installedSkillRefSchema).default([]),
  lastCheck: z.union([z.string(), z.date()]).optional(),
});

export const suggestRequestSchema = z.object({
  taskDescription: z.string().trim().min(1, 'taskDescription is required'),
  userId: z.string().optional(),
  context: z.record(z.unknown()).optional(),
});

export const skillSearchSchema = z.object({
  query: z.string().optional(),
  category: z.string().optional(),
  tag: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});
