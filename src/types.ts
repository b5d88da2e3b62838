export interface ProjectIdentity {
  /** New project name, used as package name and directory name */
  projectName: string;
  /** GitHub user or organisation that owns the repository */
  githubUsername: string;
}

export interface BootstrapOptions {
  /** Directory the template files are resolved against. Defaults to process.cwd(). */
  cwd?: string;
  /** Name shown in the "delete this script" hint */
  scriptName?: string;
}

export interface Prompter {
  ask(question: string): Promise<string>;
  close(): void;
}
