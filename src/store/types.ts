import type { Skill, UserSkillInstallation } from '../skills/types.js';
import type { ContextRecord } from '../contexts/types.js';

export interface SkillCatalogStore {
  listSkills(): Promise<Skill[]>;
  getSkill(skillId: string): Promise<Skill | null>;
  /** Inserts or replaces by skillId */
  saveSkill(skill: Skill): Promise<void>;
  /** Adds one to usageCount in a single keyed update; null for an unknown skill */
  incrementUsage(skillId: string, at: Date): Promise<Skill | null>;
}

export interface InstallationStore {
  listForUser(userId: string): Promise<UserSkillInstallation[]>;
  get(userId: string, skillId: string): Promise<UserSkillInstallation | null>;
  /**
   * Atomic insert-or-update keyed by (userId, skillId). `createdAt` of an
   * existing row is kept.
   */
  upsert(installation: UserSkillInstallation): Promise<UserSkillInstallation>;
}

/**
 * Stores hand out copies: a record returned by `get` or `scan` can be
 * changed by the caller without touching what is stored.
 */
export interface ContextRecordStore {
  get(contextId: string): Promise<ContextRecord | null>;
  scan(predicate: (record: ContextRecord) => boolean): Promise<ContextRecord[]>;
  /** Rejects a duplicate contextId */
  insert(record: ContextRecord): Promise<void>;
}

export interface Stores {
  catalog: SkillCatalogStore;
  installations: InstallationStore;
  contexts: ContextRecordStore;
}

export function installationKey(userId: string, skillId: string): string {
  return `${userId}\u0000${skillId}`;
}

/** The row an upsert leaves behind: new values, original createdAt */
export function mergeInstallation(
  existing: UserSkillInstallation | undefined,
  incoming: UserSkillInstallation,
): UserSkillInstallation {
  return existing ? { ...incoming, createdAt: existing.createdAt } : incoming;
}

export function bumpUsage(skill: Skill, at: Date): Skill {
  return { ...skill, usageCount: skill.usageCount + 1, updatedAt: at };
}
