import * as path from 'node:path';
import type { Command } from 'commander';
import { DEFAULT_SCRIPT_NAME } from '../config';
import { describeRename, renameTemplateDir } from '../edits/rename-dir';
import {
  describeSubstitution,
  SUBSTITUTION_TARGETS,
  substituteInFile,
} from '../edits/substitute';
import type { BootstrapOptions, ProjectIdentity, Prompter } from '../types';
import { renderNextSteps } from '../utils/next-steps';
import { createPrompter, PromptCancelledError } from '../utils/prompt';

const PACKAGE_ROOT = path.resolve(__dirname, '../..');

export class InputValidationError extends Error {
  constructor(
    message: string,
    public readonly field: keyof ProjectIdentity,
  ) {
    super(message);
    this.name = 'InputValidationError';
  }
}

export function parseProjectName(raw: string): string {
  const projectName = raw.trim();
  if (!projectName) {
    throw new InputValidationError(
      'Project name cannot be empty.',
      'projectName',
    );
  }
  return projectName;
}

export function parseGithubUsername(raw: string): string {
  const githubUsername = raw.trim();
  if (!githubUsername) {
    throw new InputValidationError(
      'GitHub username cannot be empty.',
      'githubUsername',
    );
  }
  return githubUsername;
}

/**
 * Asks for whatever was not passed on the command line.
 * The project name is validated before the username is asked for.
 */
export async function collectIdentity(
  prompter: Prompter,
  preset: Partial<ProjectIdentity> = {},
): Promise<ProjectIdentity> {
  const projectName = parseProjectName(
    preset.projectName ??
      (await prompter.ask(
        'Enter your project name (e.g., my-awesome-project): ',
      )),
  );
  const githubUsername = parseGithubUsername(
    preset.githubUsername ??
      (await prompter.ask('Enter your GitHub username (e.g., octocat): ')),
  );
  return { projectName, githubUsername };
}

export async function bootstrapProject(
  identity: ProjectIdentity,
  options: BootstrapOptions = {},
): Promise<void> {
  const cwd = options.cwd ?? process.cwd();
  const { projectName, githubUsername } = identity;

  console.log(
    `\nBootstrapping project '${projectName}' for user '${githubUsername}'...\n`,
  );

  for (const target of SUBSTITUTION_TARGETS) {
    const outcome = await substituteInFile(cwd, target, identity);
    console.log(describeSubstitution(target, outcome));
  }

  const renamed = await renameTemplateDir(cwd, projectName);
  console.log(describeRename(projectName, renamed));

  const nextSteps = await renderNextSteps({
    projectName,
    scriptName: options.scriptName ?? DEFAULT_SCRIPT_NAME,
  });
  console.log(`\n${nextSteps}`);
}

/**
 * Path of the running script relative to the bootstrapped directory.
 * A script outside it, or one that belongs to this package's own build
 * (an installed bin), is not there to delete, so the package name is shown.
 */
export function resolveScriptName(
  cwd: string,
  scriptPath: string | undefined,
): string {
  if (!scriptPath) {
    return DEFAULT_SCRIPT_NAME;
  }
  const absolute = path.resolve(cwd, scriptPath);
  const relative = path.relative(cwd, absolute);
  if (
    !path.relative(PACKAGE_ROOT, absolute).startsWith('..') ||
    relative === '' ||
    relative.startsWith('..') ||
    path.isAbsolute(relative) ||
    relative.split(path.sep).includes('node_modules')
  ) {
    return DEFAULT_SCRIPT_NAME;
  }
  return relative;
}

interface BootstrapCommandOptions {
  projectName?: string;
  githubUsername?: string;
  cwd?: string;
}

export function registerBootstrapCommand(
  program: Command,
  createInputPrompter: () => Prompter = () => createPrompter(),
): void {
  program
    .command('bootstrap', { isDefault: true })
    .description(
      'Rename the template project: rewrite placeholders and rename the template directory',
    )
    .option('-n, --project-name <name>', 'Project name (prompted if omitted)')
    .option(
      '-u, --github-username <name>',
      'GitHub username or organisation (prompted if omitted)',
    )
    .option(
      '-C, --cwd <path>',
      'Directory to bootstrap (defaults to current directory)',
    )
    .action(async (opts: BootstrapCommandOptions) => {
      console.log('Welcome to the project bootstrap script!');

      let identity: ProjectIdentity;
      const prompter = createInputPrompter();
      try {
        identity = await collectIdentity(prompter, {
          projectName: opts.projectName,
          githubUsername: opts.githubUsername,
        });
      } catch (error) {
        if (error instanceof InputValidationError) {
          console.error(`❌ Error: ${error.message}`);
          process.exitCode = 1;
          return;
        }
        if (error instanceof PromptCancelledError) {
          console.log(`\n${error.message}`);
          return;
        }
        throw error;
      } finally {
        prompter.close();
      }

      const cwd = opts.cwd ? path.resolve(opts.cwd) : process.cwd();
      await bootstrapProject(identity, {
        cwd,
        scriptName: resolveScriptName(cwd, process.argv[1]),
      });
    });
}
