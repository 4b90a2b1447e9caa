// Path: src/commands/prompts.ts
// Interactive selection of application, environment and output path

import inquirer from 'inquirer';
import type { Catalog } from '../lib/catalog/index.js';

export interface Selection {
  app: string;
  env: string;
}

interface AppAnswer {
  app: string;
}

interface EnvAnswer {
  env: string;
}

interface OutputAnswer {
  output: string;
}

/**
 * Ask for whichever of application and environment was not given
 */
export async function promptSelection(
  catalog: Catalog,
  given: Partial<Selection>
): Promise<Selection> {
  let app = given.app;
  if (!app || !catalog.applications.has(app)) {
    const answer = await inquirer.prompt<AppAnswer>([
      {
        type: 'list',
        name: 'app',
        message: 'Application:',
        choices: Array.from(catalog.applications.values(), (entry) => ({
          name: entry.description ? `${entry.name} - ${entry.description}` : entry.name,
          value: entry.name,
        })),
      },
    ]);
    app = answer.app;
  }

  const environments = catalog.applications.get(app)?.environments ?? [];
  let env = given.env;
  if (!env || !environments.includes(env)) {
    const answer = await inquirer.prompt<EnvAnswer>([
      {
        type: 'list',
        name: 'env',
        message: `Environment for ${app}:`,
        choices: [...environments],
      },
    ]);
    env = answer.env;
  }

  return { app, env };
}

export async function promptOutputPath(defaultPath: string): Promise<string> {
  const answer = await inquirer.prompt<OutputAnswer>([
    {
      type: 'input',
      name: 'output',
      message: 'Output file path:',
      default: defaultPath,
    },
  ]);
  return answer.output || defaultPath;
}
