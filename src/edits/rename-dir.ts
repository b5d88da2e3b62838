import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { TEMPLATE_DIR } from '../config';
import { isDirectory, pathExists } from '../utils/fs';

export type RenameOutcome = 'renamed' | 'already-exists' | 'missing' | 'same-name';

/**
 * Renames the template directory to the project name.
 * An existing entry under the new name is never replaced or merged into.
 */
export async function renameTemplateDir(
  cwd: string,
  projectName: string,
): Promise<RenameOutcome> {
  if (projectName === TEMPLATE_DIR) {
    return 'same-name';
  }

  const source = path.join(cwd, TEMPLATE_DIR);
  const destination = path.join(cwd, projectName);

  if (await pathExists(destination)) {
    return 'already-exists';
  }

  if (!(await isDirectory(source))) {
    return 'missing';
  }

  await fs.rename(source, destination);
  return 'renamed';
}

export function describeRename(
  projectName: string,
  outcome: RenameOutcome,
): string {
  switch (outcome) {
    case 'renamed':
      return `✅ Renamed directory '${TEMPLATE_DIR}' to '${projectName}'`;
    case 'already-exists':
      return `ℹ️  Directory '${projectName}' already exists.`;
    case 'same-name':
      return `ℹ️  Directory '${TEMPLATE_DIR}' already has the project name.`;
    case 'missing':
      return `⚠️  Warning: Directory '${TEMPLATE_DIR}' not found.`;
  }
}
