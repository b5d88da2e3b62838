/**
 * Placeholder literals the template ships with.
 * Each one is replaced verbatim; none of them is a pattern.
 */
export const PLACEHOLDERS = {
  /** GitHub slug used in badges, links and manifests */
  repository: 'fast/template',
  /** README token for the bare project name */
  projectName: '${projectName}',
  /** Package name and directory of the template crate */
  packageName: 'template',
} as const;

/** Directory that holds the template crate and gets renamed */
export const TEMPLATE_DIR = PLACEHOLDERS.packageName;

/** Fallback shown in the clean-up hint when the script path is unknown */
export const DEFAULT_SCRIPT_NAME = 'template-bootstrap';
