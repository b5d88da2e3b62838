import { readFileSync } from 'node:fs';
import * as path from 'node:path';
import { describe, expect, test } from 'vitest';
import { createProgram, readPackageInfo } from './cli';

const packageJson: unknown = JSON.parse(
  readFileSync(path.join(__dirname, '../package.json'), 'utf-8'),
);

describe('CLI', () => {
  test('should have correct name and version from package.json', () => {
    const program = createProgram();
    expect(packageJson).toMatchObject({
      name: program.name(),
      version: program.version(),
    });
  });

  test('should have description', () => {
    const program = createProgram();
    expect(program.description()).toBe(
      'Personalize a project template in place',
    );
  });

  test('should register bootstrap as the default command', () => {
    const program = createProgram();
    const names = program.commands.map((cmd) => cmd.name());
    expect(names).toEqual(['bootstrap']);
  });

  describe('readPackageInfo', () => {
    test('should read name and version', () => {
      expect(readPackageInfo().name).toBe('template-bootstrap');
    });

    test('should throw when name or version is missing', () => {
      const tsconfigPath = path.join(__dirname, '../tsconfig.json');
      expect(() => readPackageInfo(tsconfigPath)).toThrow(
        'Invalid package.json',
      );
    });
  });
});
