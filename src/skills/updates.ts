import type { CatalogSnapshot } from './catalog.js';
import type { InstalledSkillRef, NewSkill, Skill, SkillDiff, SkillUpdate, UserSkillInstallation } from './types.js';
import type { InstallationStore } from '../store/types.js';
import { compareVersions, tryParseVersion } from './semver.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('updates');

const EPOCH = new Date(0);

/**
 * Reads a last-check timestamp. Missing or unparseable values mean "never
 * checked", so every uninstalled skill counts as new.
 */
export function parseLastCheck(lastCheck: string | Date | undefined): Date {
  if (lastCheck === undefined || lastCheck === '') return EPOCH;

  const date = lastCheck instanceof Date ? lastCheck : new Date(lastCheck);
  if (Number.isNaN(date.getTime())) {
    logger.warn('Unparseable lastCheck, treating every skill as new', { lastCheck: String(lastCheck) });
    return EPOCH;
  }
  return date;
}

function byTitle<T extends { name: string; skillId: string }>(a: T, b: T): number {
  if (a.name !== b.name) return a.name < b.name ? -1 : 1;
  return a.skillId < b.skillId ? -1 : a.skillId > b.skillId ? 1 : 0;
}

function toUpdate(skill: Skill, currentVersion: string): SkillUpdate {
  return {
    skillId: skill.skillId,
    name: skill.title,
    currentVersion,
    latestVersion: skill.version,
    category: skill.category || 'general',
    description: skill.description,
    usageCount: skill.usageCount,
    maintainer: skill.maintainer ?? 'unknown',
  };
}

function toNewSkill(skill: Skill): NewSkill {
  return {
    skillId: skill.skillId,
    name: skill.title,
    latestVersion: skill.version,
    category: skill.category || 'general',
    description: skill.description,
  };
}

/**
 * Splits the catalog into skills created since the last check that the user
 * lacks, and installed skills with a strictly newer catalog version.
 */
export function diffSkills(snapshot: CatalogSnapshot, installed: readonly InstalledSkillRef[], lastCheck: Date): SkillDiff {
  const installedVersions = new Map(installed.map(ref => [ref.skillId, ref.version]));
  const availableUpdates: SkillUpdate[] = [];
  const newSkills: NewSkill[] = [];

  for (const skill of snapshot.skills) {
    const currentVersion = installedVersions.get(skill.skillId);

    if (currentVersion === undefined) {
      if (skill.createdAt.getTime() > lastCheck.getTime()) {
        newSkills.push(toNewSkill(skill));
      }
      continue;
    }

    const current = tryParseVersion(currentVersion);
    if (!current) {
      logger.warn('Malformed installed version, skipping update check', { skillId: skill.skillId, version: currentVersion });
      continue;
    }

    const latest = tryParseVersion(skill.version);
    if (!latest) {
      logger.warn('Malformed catalog version, skipping update check', { skillId: skill.skillId, version: skill.version });
      continue;
    }

    if (compareVersions(latest, current) > 0) {
      availableUpdates.push(toUpdate(skill, currentVersion));
    }
  }

  return {
    availableUpdates: availableUpdates.sort(byTitle),
    newSkills: newSkills.sort(byTitle),
  };
}

/**
 * Stamps every reported installation with the check time. Repeating a check
 * with unchanged input only moves lastCheckTimestamp forward.
 */
export async function recordCheck(
  store: InstallationStore,
  userId: string,
  installed: readonly InstalledSkillRef[],
  checkedAt: Date,
): Promise<UserSkillInstallation[]> {
  const rows: UserSkillInstallation[] = [];
  for (const ref of installed) {
    rows.push(
      await store.upsert({
        userId,
        skillId: ref.skillId,
        installedVersion: ref.version,
        lastCheckTimestamp: checkedAt,
        createdAt: checkedAt,
        updatedAt: checkedAt,
      }),
    );
  }
  return rows;
}
