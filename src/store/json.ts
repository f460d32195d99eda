import { closeSync, existsSync, mkdirSync, openSync, readFileSync, renameSync, rmSync, statSync, writeFileSync } from 'fs';
import { basename, dirname, join } from 'path';
import type { ZodType, ZodTypeDef } from 'zod';
import type { Skill, UserSkillInstallation } from '../skills/types.js';
import type { ContextRecord } from '../contexts/types.js';
import type { ContextRecordStore, InstallationStore, SkillCatalogStore, Stores } from './types.js';
import { bumpUsage, installationKey, mergeInstallation } from './types.js';
import { skillSchema, installationSchema } from '../skills/schema.js';
import { contextRecordSchema } from '../contexts/schema.js';
import { StoreUnavailableError, describeZodError } from '../errors.js';
import { createLogger, type Logger } from '../utils/logger.js';

const logger = createLogger('store');

export const SKILLS_FILE = 'skills.json';
export const INSTALLATIONS_FILE = 'installations.json';
export const CONTEXTS_FILE = 'contexts.json';

const LOCK_RETRY_MS = 10;
const LOCK_TIMEOUT_MS = 2000;
const STALE_LOCK_MS = 10_000;

function sleepSync(ms: number): void {
  Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
}

/**
 * One JSON array on disk, shared by every process pointed at the same data
 * directory. Nothing is cached: reads parse the file, and `update` takes an
 * exclusive `.lock` file, re-reads, applies one change and writes it back
 * through a temp file and rename without yielding to the event loop.
 */
export class JsonFile<T> {
  private readonly logger: Logger;

  constructor(
    readonly path: string,
    private readonly schema: ZodType<T, ZodTypeDef, unknown>,
    private readonly name: string,
  ) {
    this.logger = logger.child(basename(path));
  }

  read(): T[] {
    if (!existsSync(this.path)) return [];

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.path, 'utf-8'));
    } catch (error) {
      throw new StoreUnavailableError(this.name, error);
    }

    if (!Array.isArray(raw)) {
      throw new StoreUnavailableError(this.name, new Error(`${this.path} does not hold a JSON array`));
    }

    const entries: T[] = [];
    raw.forEach((entry, index) => {
      const parsed = this.schema.safeParse(entry);
      if (parsed.success) {
        entries.push(parsed.data);
      } else {
        this.logger.warn(`Skipping invalid ${this.name} entry`, { index, issues: describeZodError(parsed.error) });
      }
    });
    return entries;
  }

  write(entries: T[]): void {
    const dir = dirname(this.path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }

    const tmpPath = `${this.path}.${process.pid}.tmp`;
    try {
      writeFileSync(tmpPath, JSON.stringify(entries, null, 2), 'utf-8');
      renameSync(tmpPath, this.path);
    } catch (error) {
      throw new StoreUnavailableError(this.name, error);
    }
  }

  private lock(): () => void {
    const lockPath = `${this.path}.lock`;
    const dir = dirname(this.path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }

    const deadline = Date.now() + LOCK_TIMEOUT_MS;
    for (;;) {
      try {
        closeSync(openSync(lockPath, 'wx'));
        return () => rmSync(lockPath, { force: true });
      } catch (error) {
        if (!(error instanceof Error && 'code' in error && error.code === 'EEXIST')) {
          throw new StoreUnavailableError(this.name, error);
        }
      }

      const held = statSync(lockPath, { throwIfNoEntry: false });
      if (held && Date.now() - held.mtimeMs > STALE_LOCK_MS) {
        this.logger.warn('Removing stale lock', { lockPath });
        rmSync(lockPath, { force: true });
        continue;
      }
      if (Date.now() >= deadline) {
        throw new StoreUnavailableError(this.name, new Error(`Timed out waiting for ${lockPath}`));
      }
      sleepSync(LOCK_RETRY_MS);
    }
  }

  /** Locked read-modify-write of the current file contents */
  update<R>(change: (entries: T[]) => { entries: T[]; result: R }): R {
    const release = this.lock();
    try {
      const { entries, result } = change(this.read());
      this.write(entries);
      return result;
    } finally {
      release();
    }
  }
}

export class JsonSkillCatalogStore implements SkillCatalogStore {
  private readonly file: JsonFile<Skill>;

  constructor(dataDir: string) {
    this.file = new JsonFile(join(dataDir, SKILLS_FILE), skillSchema, 'skill catalog');
  }

  async listSkills(): Promise<Skill[]> {
    return this.file.read();
  }

  async getSkill(skillId: string): Promise<Skill | null> {
    return this.file.read().find(skill => skill.skillId === skillId) ?? null;
  }

  async saveSkill(skill: Skill): Promise<void> {
    const parsed = skillSchema.parse(skill);
    this.file.update(skills => ({
      entries: [...skills.filter(existing => existing.skillId !== parsed.skillId), parsed],
      result: undefined,
    }));
  }

  async incrementUsage(skillId: string, at: Date): Promise<Skill | null> {
    return this.file.update(skills => {
      const index = skills.findIndex(skill => skill.skillId === skillId);
      if (index < 0) return { entries: skills, result: null };

      const updated = bumpUsage(skills[index], at);
      const entries = [...skills];
      entries[index] = updated;
      return { entries, result: updated };
    });
  }
}

export class JsonInstallationStore implements InstallationStore {
  private readonly file: JsonFile<UserSkillInstallation>;

  constructor(dataDir: string) {
    this.file = new JsonFile(join(dataDir, INSTALLATIONS_FILE), installationSchema, 'installation');
  }

  async listForUser(userId: string): Promise<UserSkillInstallation[]> {
    return this.file.read().filter(row => row.userId === userId);
  }

  async get(userId: string, skillId: string): Promise<UserSkillInstallation | null> {
    return this.file.read().find(row => row.userId === userId && row.skillId === skillId) ?? null;
  }

  async upsert(installation: UserSkillInstallation): Promise<UserSkillInstallation> {
    const parsed = installationSchema.parse(installation);
    const key = installationKey(parsed.userId, parsed.skillId);

    return this.file.update(rows => {
      const index = rows.findIndex(row => installationKey(row.userId, row.skillId) === key);
      const row = mergeInstallation(index >= 0 ? rows[index] : undefined, parsed);
      const entries = [...rows];
      if (index >= 0) entries[index] = row;
      else entries.push(row);
      return { entries, result: row };
    });
  }
}

export class JsonContextRecordStore implements ContextRecordStore {
  private readonly file: JsonFile<ContextRecord>;

  constructor(dataDir: string) {
    this.file = new JsonFile(join(dataDir, CONTEXTS_FILE), contextRecordSchema, 'context');
  }

  async get(contextId: string): Promise<ContextRecord | null> {
    return this.file.read().find(record => record.contextId === contextId) ?? null;
  }

  async scan(predicate: (record: ContextRecord) => boolean): Promise<ContextRecord[]> {
    return this.file.read().filter(predicate);
  }

  async insert(record: ContextRecord): Promise<void> {
    const parsed = contextRecordSchema.parse(record);
    this.file.update(records => {
      if (records.some(existing => existing.contextId === parsed.contextId)) {
        throw new Error(`Context ${parsed.contextId} already exists`);
      }
      return { entries: [...records, parsed], result: undefined };
    });
  }
}

export function createJsonStores(dataDir: string): Stores {
  return {
    catalog: new JsonSkillCatalogStore(dataDir),
    installations: new JsonInstallationStore(dataDir),
    contexts: new JsonContextRecordStore(dataDir),
  };
}
