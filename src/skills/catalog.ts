import type { Skill, SkillSearchFilters } from './types.js';
import type { SkillCatalogStore } from '../store/types.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('catalog');

/**
 * Immutable view of the catalog. One request reads one snapshot from start
 * to finish.
 */
export class CatalogSnapshot {
  readonly skills: readonly Skill[];
  readonly loadedAt: Date;
  private readonly byId: ReadonlyMap<string, Skill>;

  constructor(skills: Skill[], loadedAt = new Date()) {
    this.skills = Object.freeze([...skills]);
    this.byId = new Map(skills.map(skill => [skill.skillId, skill]));
    this.loadedAt = loadedAt;
  }

  get size(): number {
    return this.skills.length;
  }

  get(skillId: string): Skill | undefined {
    return this.byId.get(skillId);
  }

  withEmbeddings(): Skill[] {
    return this.skills.filter(skill => skill.embedding !== null && skill.embedding.length > 0);
  }
}

export interface CatalogCacheOptions {
  refreshIntervalMs: number;
  now?: () => number;
}

/**
 * Holds the current snapshot and replaces it wholesale on refresh.
 * Concurrent refreshes share one load.
 */
export class CatalogCache {
  private current: CatalogSnapshot | null = null;
  private inFlight: Promise<CatalogSnapshot> | null = null;
  private readonly now: () => number;

  constructor(
    private readonly store: SkillCatalogStore,
    private readonly options: CatalogCacheOptions,
  ) {
    this.now = options.now ?? Date.now;
  }

  private isStale(snapshot: CatalogSnapshot): boolean {
    return this.now() - snapshot.loadedAt.getTime() >= this.options.refreshIntervalMs;
  }

  async snapshot(): Promise<CatalogSnapshot> {
    if (this.current && !this.isStale(this.current)) {
      return this.current;
    }
    return this.refresh();
  }

  refresh(): Promise<CatalogSnapshot> {
    if (this.inFlight) return this.inFlight;

    this.inFlight = this.store
      .listSkills()
      .then(skills => {
        const snapshot = new CatalogSnapshot(skills, new Date(this.now()));
        this.current = snapshot;
        logger.debug('Catalog refreshed', { skills: snapshot.size });
        return snapshot;
      })
      .finally(() => {
        this.inFlight = null;
      });

    return this.inFlight;
  }

  invalidate(): void {
    this.current = null;
  }
}

function byNewest(a: Skill, b: Skill): number {
  const diff = b.createdAt.getTime() - a.createdAt.getTime();
  if (diff !== 0) return diff;
  return a.skillId < b.skillId ? -1 : a.skillId > b.skillId ? 1 : 0;
}

export function listSkills(snapshot: CatalogSnapshot, limit: number): Skill[] {
  return [...snapshot.skills].sort(byNewest).slice(0, limit);
}

/**
 * Text search over title and description plus exact category and tag
 * filters, newest first.
 */
export function searchSkills(snapshot: CatalogSnapshot, filters: SkillSearchFilters, limit: number): Skill[] {
  const query = filters.query?.toLowerCase();

  return snapshot.skills
    .filter(skill => {
      if (query && !skill.title.toLowerCase().includes(query) && !skill.description.toLowerCase().includes(query)) {
        return false;
      }
      if (filters.category && skill.category !== filters.category) return false;
      if (filters.tag && !skill.tags.includes(filters.tag)) return false;
      return true;
    })
    .sort(byNewest)
    .slice(0, limit);
}
