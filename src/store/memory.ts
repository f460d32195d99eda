import type { Skill, UserSkillInstallation } from '../skills/types.js';
import type { ContextRecord } from '../contexts/types.js';
import type { ContextRecordStore, InstallationStore, SkillCatalogStore, Stores } from './types.js';
import { bumpUsage, installationKey, mergeInstallation } from './types.js';

/**
 * In-process stores for tests and embedding the engines in another host.
 */
export class MemorySkillCatalogStore implements SkillCatalogStore {
  protected readonly skills = new Map<string, Skill>();

  constructor(skills: Skill[] = []) {
    for (const skill of skills) this.skills.set(skill.skillId, skill);
  }

  async listSkills(): Promise<Skill[]> {
    return [...this.skills.values()];
  }

  async getSkill(skillId: string): Promise<Skill | null> {
    return this.skills.get(skillId) ?? null;
  }

  async saveSkill(skill: Skill): Promise<void> {
    this.skills.set(skill.skillId, skill);
  }

  async incrementUsage(skillId: string, at: Date): Promise<Skill | null> {
    const skill = this.skills.get(skillId);
    if (!skill) return null;
    const updated = bumpUsage(skill, at);
    this.skills.set(skillId, updated);
    return updated;
  }
}

export class MemoryInstallationStore implements InstallationStore {
  protected readonly rows = new Map<string, UserSkillInstallation>();

  constructor(rows: UserSkillInstallation[] = []) {
    for (const row of rows) this.rows.set(installationKey(row.userId, row.skillId), row);
  }

  async listForUser(userId: string): Promise<UserSkillInstallation[]> {
    return [...this.rows.values()].filter(row => row.userId === userId);
  }

  async get(userId: string, skillId: string): Promise<UserSkillInstallation | null> {
    return this.rows.get(installationKey(userId, skillId)) ?? null;
  }

  async upsert(installation: UserSkillInstallation): Promise<UserSkillInstallation> {
    const key = installationKey(installation.userId, installation.skillId);
    const row = mergeInstallation(this.rows.get(key), installation);
    this.rows.set(key, row);
    return row;
  }
}

export class MemoryContextRecordStore implements ContextRecordStore {
  protected readonly records = new Map<string, ContextRecord>();

  constructor(records: ContextRecord[] = []) {
    for (const record of records) this.records.set(record.contextId, structuredClone(record));
  }

  async get(contextId: string): Promise<ContextRecord | null> {
    const record = this.records.get(contextId);
    return record ? structuredClone(record) : null;
  }

  async scan(predicate: (record: ContextRecord) => boolean): Promise<ContextRecord[]> {
    return [...this.records.values()].filter(predicate).map(record => structuredClone(record));
  }

  async insert(record: ContextRecord): Promise<void> {
    if (this.records.has(record.contextId)) {
      throw new Error(`Context ${record.contextId} already exists`);
    }
    this.records.set(record.contextId, structuredClone(record));
  }
}

export function createMemoryStores(seed: { skills?: Skill[]; installations?: UserSkillInstallation[]; contexts?: ContextRecord[] } = {}): Stores {
  return {
    catalog: new MemorySkillCatalogStore(seed.skills),
    installations: new MemoryInstallationStore(seed.installations),
    contexts: new MemoryContextRecordStore(seed.contexts),
  };
}
