import * as path from 'node:path';
import ejs from 'ejs';

const NEXT_STEPS_TEMPLATE = path.join(
  __dirname,
  '../../templates/next-steps.txt.ejs',
);

export interface NextStepsData {
  projectName: string;
  /** Path of the bootstrap script, relative to the bootstrapped directory */
  scriptName: string;
}

/** Completion block printed after the last step */
export async function renderNextSteps(data: NextStepsData): Promise<string> {
  const rendered = await ejs.renderFile(NEXT_STEPS_TEMPLATE, { ...data });
  return rendered.trimEnd();
}
