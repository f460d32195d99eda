#!/usr/bin/env node
import 'dotenv/config';
import { readFileSync } from 'fs';
import chalk from 'chalk';
import ora from 'ora';
import { getSkillPlane } from './plane.js';
import { loadConfig, getEmbeddingModelConfig } from './config.js';
import { checkOllamaConnection, isLocalModel } from './providers/index.js';
import { SkillPlaneError } from './errors.js';
import { parseArgs, flagValue, parseInstalledFlag, parseJsonArg, type ParsedArgs } from './utils/args.js';
import {
  formatContext,
  formatSearchResult,
  formatSkill,
  formatSuggestions,
  formatUpdates,
} from './utils/format.js';
import type { InstalledSkillRef } from './skills/types.js';

type Flags = ParsedArgs['flags'];

function print(lines: string[]): void {
  console.log(lines.join('\n'));
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

function parseLimit(flags: Flags): number | undefined {
  const raw = flagValue(flags, 'limit');
  return raw === undefined ? undefined : Number(raw);
}

/**
 * Installed skills come from --installed, else from the user's recorded
 * installations.
 */
async function resolveInstalled(flags: Flags, userId: string): Promise<InstalledSkillRef[]> {
  const raw = flagValue(flags, 'installed');
  if (raw !== undefined) return parseInstalledFlag(raw);

  const rows = await getSkillPlane().getInstallations(userId);
  return rows.map(row => ({ skillId: row.skillId, version: row.installedVersion }));
}

async function suggestCommand(args: ParsedArgs): Promise<void> {
  const taskDescription = args.positionals.join(' ');
  const spinner = ora('Matching skills...').start();

  const response = await getSkillPlane().suggest({
    taskDescription,
    userId: flagValue(args.flags, 'user'),
  });
  spinner.stop();

  if (args.flags.json) return printJson(response);
  print(formatSuggestions(response));
}

async function updatesCommand(args: ParsedArgs): Promise<void> {
  const userId = flagValue(args.flags, 'user') ?? process.env.USER ?? '';
  const installedSkills = await resolveInstalled(args.flags, userId);

  const response = await getSkillPlane().checkForUpdates({
    userId,
    installedSkills,
    lastCheck: flagValue(args.flags, 'since'),
  });

  if (args.flags.json) return printJson(response);
  print(formatUpdates(response));
}

async function searchCommand(args: ParsedArgs): Promise<void> {
  const { flags } = args;
  const filters: Record<string, unknown> = {
    repoID: flagValue(flags, 'repo'),
    ticketID: flagValue(flags, 'ticket'),
    filePath: flagValue(flags, 'file'),
    contextLevel: flagValue(flags, 'level'),
    aiClient: flagValue(flags, 'client'),
    status: flagValue(flags, 'status'),
    query: flagValue(flags, 'query') ?? (args.positionals.length > 0 ? args.positionals.join(' ') : undefined),
    limit: parseLimit(flags),
  };
  for (const key of Object.keys(filters)) {
    if (filters[key] === undefined) delete filters[key];
  }

  const result = await getSkillPlane().searchContexts(filters);

  if (flags.json) return printJson(result);
  print(formatSearchResult(result));
}

async function skillsCommand(args: ParsedArgs): Promise<void> {
  const { flags } = args;
  const query = flagValue(flags, 'query') ?? (args.positionals.length > 0 ? args.positionals.join(' ') : undefined);
  const category = flagValue(flags, 'category');
  const tag = flagValue(flags, 'tag');
  const plane = getSkillPlane();

  const skills = query || category || tag
    ? await plane.searchSkills({ query, category, tag, limit: parseLimit(flags) })
    : await plane.listSkills(parseLimit(flags));

  if (flags.json) return printJson(skills);
  if (skills.length === 0) {
    console.log(chalk.yellow('No skills found'));
    return;
  }

  console.log(chalk.blue(`\nSkills (${skills.length}):\n`));
  for (const skill of skills) {
    print(formatSkill(skill));
    console.log('');
  }
}

async function skillCommand(args: ParsedArgs): Promise<void> {
  const skill = await getSkillPlane().getSkill(args.positionals[0] ?? '');

  if (args.flags.json) return printJson(skill);
  print(formatSkill(skill));
  if (skill.content) {
    console.log(`\n${skill.content}`);
  }
}

async function installCommand(args: ParsedArgs): Promise<void> {
  const userId = flagValue(args.flags, 'user') ?? process.env.USER ?? '';
  const result = await getSkillPlane().installSkill(userId, args.positionals[0] ?? '');

  if (args.flags.json) return printJson(result);
  console.log(chalk.green(`Installed ${result.skillId}@${result.version} for ${userId}`));
}

async function contextCommand(args: ParsedArgs): Promise<void> {
  const record = await getSkillPlane().getContext(args.positionals[0] ?? '');

  if (args.flags.json) return printJson(record);
  print(formatContext(record));
}

async function contextsCommand(args: ParsedArgs): Promise<void> {
  const userId = flagValue(args.flags, 'user') ?? args.positionals[0] ?? process.env.USER ?? '';
  const records = await getSkillPlane().getUserContexts(userId, parseLimit(args.flags));

  if (args.flags.json) return printJson(records);
  if (records.length === 0) {
    console.log(chalk.yellow(`No contexts for ${userId}`));
    return;
  }
  for (const record of records) {
    print(formatContext(record));
    console.log('');
  }
}

/**
 * Stores a context record read from a JSON file (or stdin with "-")
 */
async function recordCommand(args: ParsedArgs): Promise<void> {
  const source = args.positionals[0] ?? '-';
  const raw = readFileSync(source === '-' ? 0 : source, 'utf-8');
  const input = parseJsonArg(raw, source === '-' ? 'stdin' : source);
  const stored = await getSkillPlane().storeContext(input);

  if (args.flags.json) return printJson(stored);
  console.log(chalk.green(`${stored.details} (${stored.contextId})`));
  if (stored.userAlert) console.log(chalk.blue(stored.userAlert));
}

async function embedCommand(args: ParsedArgs): Promise<void> {
  const config = loadConfig();
  const modelConfig = getEmbeddingModelConfig(config);
  if (isLocalModel(modelConfig) && !(await checkOllamaConnection(config))) {
    console.log(chalk.yellow('Ollama is not reachable; skills will be left without embeddings'));
  }

  const plane = getSkillPlane();
  const spinner = ora(`Embedding skills with ${modelConfig.provider}/${modelConfig.model}...`).start();
  const result = await plane.embedCatalog();
  const catalogSize = await plane.refreshCatalog();
  spinner.stop();

  if (args.flags.json) return printJson({ ...result, catalogSize });
  console.log(
    chalk.green(`Embedded ${result.embedded.length} skills`) +
      chalk.gray(` (${result.skipped} already embedded, ${catalogSize} in catalog)`),
  );
  if (result.failed.length > 0) {
    console.log(chalk.yellow(`Failed: ${result.failed.join(', ')}`));
  }
}

/**
 * Shows help message
 */
function showHelp(): void {
  console.log(chalk.blue('\nskill-plane - skill discovery and context search\n'));
  console.log(chalk.white('Usage:'));
  console.log(chalk.white('  skill-plane suggest "<task>" [--user id]          Suggest skills for a task'));
  console.log(chalk.white('  skill-plane updates --user id [--installed ...] [--since ISO]'));
  console.log(chalk.white('                                                     New skills and available updates'));
  console.log(chalk.white('  skill-plane search [--repo --ticket --file --level --client --status --query --limit]'));
  console.log(chalk.white('                                                     Search stored contexts'));
  console.log(chalk.white('  skill-plane skills [query] [--category --tag --limit]  List or search skills'));
  console.log(chalk.white('  skill-plane skill <id>                             Show one skill'));
  console.log(chalk.white('  skill-plane install <id> --user id                 Record an installation'));
  console.log(chalk.white('  skill-plane context <contextId>                    Show one context'));
  console.log(chalk.white('  skill-plane contexts --user id [--limit n]         Recent contexts of a user'));
  console.log(chalk.white('  skill-plane record <file.json|->                   Store a context record'));
  console.log(chalk.white('  skill-plane embed                                  Embed skills lacking vectors'));
  console.log(chalk.white('  skill-plane help                                   Show this help\n'));
  console.log(chalk.gray('Add --json to any command for machine-readable output.'));
  console.log(chalk.gray('Examples:'));
  console.log(chalk.gray('  skill-plane suggest "help me test my web application" --user dev1'));
  console.log(chalk.gray('  skill-plane updates --user dev1 --installed pdf@0.8.0,xlsx@1.0.0 --since 2024-12-01T00:00:00Z'));
  console.log(chalk.gray('  skill-plane search --status blocked --repo repo_abc123'));
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));

  switch (args.command) {
    case 'suggest':
      await suggestCommand(args);
      break;

    case 'updates':
      await updatesCommand(args);
      break;

    case 'search':
      await searchCommand(args);
      break;

    case 'skills':
      await skillsCommand(args);
      break;

    case 'skill':
      await skillCommand(args);
      break;

    case 'install':
      await installCommand(args);
      break;

    case 'context':
      await contextCommand(args);
      break;

    case 'contexts':
      await contextsCommand(args);
      break;

    case 'record':
      await recordCommand(args);
      break;

    case 'embed':
      await embedCommand(args);
      break;

    case 'help':
    case '--help':
    case '-h':
      showHelp();
      break;

    default:
      console.log(chalk.red(`Unknown command: ${args.command}`));
      showHelp();
      process.exit(1);
  }
}

// Run
main().catch((error: unknown) => {
  if (error instanceof SkillPlaneError) {
    console.error(chalk.red(error.message));
    for (const detail of error.details ?? []) {
      console.error(chalk.gray(`  ${detail}`));
    }
  } else {
    console.error(chalk.red('Fatal error:'), error);
  }
  process.exit(1);
});
