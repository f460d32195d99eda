export type VisibilityScope = 'private' | 'team' | 'organization' | 'global';

export interface Skill {
  skillId: string;
  title: string;
  description: string;
  category: string;
  tags: string[];
  version: string;           // major.minor.patch
  embedding: number[] | null;
  visibilityScope: VisibilityScope;
  usageCount: number;
  createdAt: Date;
  updatedAt?: Date;
  content?: string;          // full markdown body
  maintainer?: string;
  changelogUrl?: string;
  installUrl?: string;
}

export interface UserSkillInstallation {
  userId: string;
  skillId: string;
  installedVersion: string;
  lastCheckTimestamp: Date;
  createdAt: Date;
  updatedAt: Date;
}

export type MatchMethod = 'embedding' | 'keyword fallback';

/** Why the keyword path answered instead of embeddings */
export type DegradedReason = 'timeout' | 'unavailable' | 'no-embeddings';

/** A scored candidate, before thresholds and metadata are applied */
export interface RankedSkill {
  skillId: string;
  score: number;              // clipped to [0, 1]
  matchedTerms?: string[];    // keyword path only
}

export interface SkillMetadata {
  name: string;
  description: string;
  category: string;
  capabilities: string[];
}

export interface SuggestionResult {
  skillId: string;
  confidence: number;
  score: number;
  method: MatchMethod;
  reasoning: string;
  skillMetadata: SkillMetadata;
  installed: boolean;
}

export interface SuggestRequest {
  taskDescription: string;
  userId?: string;
  context?: Record<string, unknown>;
}

export interface SuggestResponse {
  suggestions: SuggestionResult[];
  method: MatchMethod;
  degradedReason?: DegradedReason;
}

export interface InstalledSkillRef {
  skillId: string;
  version: string;
}

export interface SkillUpdate {
  skillId: string;
  name: string;
  currentVersion: string;
  latestVersion: string;
  category: string;
  description: string;
  usageCount: number;
  maintainer: string;
}

export interface NewSkill {
  skillId: string;
  name: string;
  latestVersion: string;
  category: string;
  description: string;
}

export interface SkillDiff {
  availableUpdates: SkillUpdate[];
  newSkills: NewSkill[];
}

export interface UpdatesRequest {
  userId: string;
  installedSkills: InstalledSkillRef[];
  lastCheck?: string | Date;
}

export interface UpdatesResponse extends SkillDiff {
  checkedAt: string;
}

export interface SkillSearchFilters {
  query?: string;
  category?: string;
  tag?: string;
  limit?: number;
}
