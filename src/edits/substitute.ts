import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { PLACEHOLDERS } from '../config';
import type { ProjectIdentity } from '../types';
import { pathExists } from '../utils/fs';

export interface Replacement {
  search: string;
  replace: string;
}

/**
 * A file whose placeholders are rewritten in place.
 * Paths are relative to the directory being bootstrapped.
 */
export interface SubstitutionTarget {
  file: string;
  replacements: (identity: ProjectIdentity) => Replacement[];
  /** Optional targets are skipped quietly instead of warned about */
  optional?: boolean;
  /** Appended to the "not found" warning */
  missingHint?: string;
}

export type SubstitutionOutcome = 'updated' | 'unchanged' | 'missing' | 'skipped';

const quoted = (value: string): string => `"${value}"`;

const packageNameLine = (value: string): string => `name = ${quoted(value)}`;

const repositorySlug = ({ githubUsername, projectName }: ProjectIdentity) =>
  `${githubUsername}/${projectName}`;

export const SUBSTITUTION_TARGETS: SubstitutionTarget[] = [
  {
    file: 'README.md',
    replacements: (identity) => [
      { search: PLACEHOLDERS.repository, replace: repositorySlug(identity) },
      { search: PLACEHOLDERS.projectName, replace: identity.projectName },
    ],
  },
  {
    // Workspace root: repository URL and the quoted member entry
    file: 'Cargo.toml',
    replacements: (identity) => [
      { search: PLACEHOLDERS.repository, replace: repositorySlug(identity) },
      {
        search: quoted(PLACEHOLDERS.packageName),
        replace: quoted(identity.projectName),
      },
    ],
  },
  {
    // Edited under its old directory, before the rename step runs
    file: 'template/Cargo.toml',
    replacements: ({ projectName }) => [
      {
        search: packageNameLine(PLACEHOLDERS.packageName),
        replace: packageNameLine(projectName),
      },
    ],
    missingHint: '(Did you already run this script?)',
  },
  {
    file: '.github/semantic.yml',
    replacements: (identity) => [
      { search: PLACEHOLDERS.repository, replace: repositorySlug(identity) },
    ],
    optional: true,
  },
  {
    file: 'Cargo.lock',
    replacements: ({ projectName }) => [
      {
        search: packageNameLine(PLACEHOLDERS.packageName),
        replace: packageNameLine(projectName),
      },
    ],
    optional: true,
  },
];

/**
 * Applies each replacement in order to every occurrence of its literal.
 * split/join keeps `$` sequences in the replacement literal.
 */
export function applyReplacements(
  content: string,
  replacements: Replacement[],
): string {
  return replacements.reduce(
    (current, { search, replace }) =>
      search === '' ? current : current.split(search).join(replace),
    content,
  );
}

export async function substituteInFile(
  cwd: string,
  target: SubstitutionTarget,
  identity: ProjectIdentity,
): Promise<SubstitutionOutcome> {
  const filePath = path.join(cwd, target.file);

  if (!(await pathExists(filePath))) {
    return target.optional ? 'skipped' : 'missing';
  }

  const content = await fs.readFile(filePath, 'utf-8');
  const updated = applyReplacements(content, target.replacements(identity));

  if (updated === content) {
    return 'unchanged';
  }

  await fs.writeFile(filePath, updated, 'utf-8');
  return 'updated';
}

export function describeSubstitution(
  target: SubstitutionTarget,
  outcome: SubstitutionOutcome,
): string {
  switch (outcome) {
    case 'updated':
      return `✅ Updated ${target.file}`;
    case 'unchanged':
      return `ℹ️  No changes needed in ${target.file}`;
    case 'skipped':
      return `ℹ️  Skipped ${target.file} (not present)`;
    case 'missing':
      return target.missingHint
        ? `⚠️  Warning: ${target.file} not found ${target.missingHint}`
        : `⚠️  Warning: ${target.file} not found.`;
  }
}
