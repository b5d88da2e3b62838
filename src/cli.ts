import { readFileSync } from 'node:fs';
import * as path from 'node:path';
import { Command } from 'commander';
import { registerBootstrapCommand } from './commands/bootstrap';

interface PackageInfo {
  name: string;
  version: string;
}

export function readPackageInfo(
  packageJsonPath = path.join(__dirname, '../package.json'),
): PackageInfo {
  const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
  if (
    typeof parsed === 'object' &&
    parsed !== null &&
    'name' in parsed &&
    'version' in parsed &&
    typeof parsed.name === 'string' &&
    typeof parsed.version === 'string'
  ) {
    return { name: parsed.name, version: parsed.version };
  }
  throw new Error(`Invalid package.json at ${packageJsonPath}`);
}

export function createProgram(): Command {
  const { name: NAME, version: VERSION } = readPackageInfo();
  const program = new Command();

  program
    .name(NAME)
    .description('Personalize a project template in place')
    .version(VERSION);

  registerBootstrapCommand(program);

  return program;
}
