import type { Skill, SuggestResponse, UpdatesResponse } from '../skills/types.js';
import type { ContextRecord, ContextSearchResult } from '../contexts/types.js';
import { accent, dim, header, label, muted, success, warning } from './chalk.js';

export function formatConfidence(confidence: number): string {
  return `${Math.round(confidence * 100)}%`;
}

export function formatSuggestions(response: SuggestResponse): string[] {
  if (response.suggestions.length === 0) {
    return [warning('No matching skills')];
  }

  const lines = [header(`Suggested skills (${response.method}):`)];
  if (response.degradedReason) {
    lines.push(muted(`  embedding path unavailable: ${response.degradedReason}`));
  }

  for (const suggestion of response.suggestions) {
    const installed = suggestion.installed ? success(' [installed]') : '';
    lines.push('');
    lines.push(`  ${label(suggestion.skillMetadata.name)} ${accent(formatConfidence(suggestion.confidence))}${installed}`);
    lines.push(`    ${suggestion.skillMetadata.description}`);
    lines.push(muted(`    ${suggestion.skillId} · ${suggestion.reasoning}`));
  }
  return lines;
}

export function formatUpdates(response: UpdatesResponse): string[] {
  const lines: string[] = [];

  if (response.availableUpdates.length === 0 && response.newSkills.length === 0) {
    return [success('All skills up to date')];
  }

  if (response.availableUpdates.length > 0) {
    lines.push(header(`Updates available (${response.availableUpdates.length}):`));
    for (const update of response.availableUpdates) {
      lines.push(`  ${label(update.name)} ${update.currentVersion} → ${accent(update.latestVersion)} ${muted(`(${update.category})`)}`);
    }
  }

  if (response.newSkills.length > 0) {
    if (lines.length > 0) lines.push('');
    lines.push(header(`New skills (${response.newSkills.length}):`));
    for (const skill of response.newSkills) {
      lines.push(`  ${label(skill.name)} ${accent(skill.latestVersion)} ${muted(`(${skill.category})`)}`);
    }
  }

  return lines;
}

export function formatSkill(skill: Skill): string[] {
  const lines = [
    `${label(skill.title)} ${accent(skill.version)} ${muted(skill.skillId)}`,
    `  ${skill.description}`,
    muted(`  category: ${skill.category} · visibility: ${skill.visibilityScope} · installs: ${skill.usageCount}`),
  ];
  if (skill.tags.length > 0) {
    lines.push(muted(`  tags: ${skill.tags.join(', ')}`));
  }
  return lines;
}

export function formatContext(record: ContextRecord): string[] {
  const { data } = record;
  const where = [data.repoID, data.ticketID].filter(Boolean).join(' / ');
  const lines = [
    `${label(record.contextId)} ${dim(record.timestamp.toISOString())}${where ? ` ${accent(where)}` : ''}`,
  ];

  const meta = [
    data.contextLevel && `level: ${data.contextLevel}`,
    data.status && `status: ${data.status}${data.blockedBy ? ` (by ${data.blockedBy})` : ''}`,
    data.AI_Client_type?.length && `clients: ${data.AI_Client_type.join(', ')}`,
  ].filter((part): part is string => typeof part === 'string');
  if (meta.length > 0) lines.push(muted(`  ${meta.join(' · ')}`));

  if (data.details) lines.push(`  ${data.details}`);
  for (const file of data.files ?? []) {
    lines.push(muted(`  ${file.action ?? 'touched'} ${file.path}`));
  }
  return lines;
}

export function formatSearchResult(result: ContextSearchResult): string[] {
  if (result.count === 0) {
    return [warning('No matching contexts')];
  }

  const lines = [header(`Contexts (${result.count} of ${result.total}):`)];
  for (const record of result.data) {
    lines.push('');
    lines.push(...formatContext(record));
  }
  return lines;
}
