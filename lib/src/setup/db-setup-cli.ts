#! /usr/bin/env node

import { writeFile } from 'node:fs/promises';
import { Interface, createInterface } from 'readline';
import { printFailedEventEnvVariables } from '../common/config';
import { DatabaseSetupExporter } from './database-setup-exporter';
const { createSetupScript } = DatabaseSetupExporter;

/** Async way to ask a question from the CLI */
const input = (prompt: string, rli: Interface): Promise<string> => {
  return new Promise((callbackFn) => {
    rli.question(prompt, (userInput: string): void => {
      callbackFn(userInput?.trim());
    });
  });
};

/** Get a value from the command line with allowed values and a default value */
const getValueFromInput = async (
  rli: Interface,
  prompt: string,
  allowedAnswers?: string[],
  defaultValue?: string,
): Promise<string> => {
  let answer;
  do {
    const d = defaultValue ? ` (default: ${defaultValue})` : '';
    answer = await input(`\x1b[32m${prompt}\x1b[0m${d}\n> `, rli);
    if (defaultValue && !answer) {
      answer = defaultValue;
    }
  } while (allowedAnswers ? allowedAnswers.indexOf(answer) < 0 : !answer);
  return answer;
};

/** Execute the CLI */
export const dbSetupCli = async (): Promise<void> => {
  const rli = createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  const getValue = (
    prompt: string,
    allowedAnswers?: string[],
    defaultValue?: string,
  ) => getValueFromInput(rli, prompt, allowedAnswers, defaultValue);

  try {
    const database = await getValue('What is the name of your database?');
    const schema = await getValue(
      'What should the name of the database schema be?',
      undefined,
      'public',
    );
    const table = await getValue(
      'What name should the failed event table have?',
      undefined,
      'failed_event',
    );
    const coordinatorRole = await getValue(
      'What is the name of your database role for the retry coordinator?',
      undefined,
      'failed_event_coordinator',
    );
    const captureRole = await getValue(
      'What is the name of your database role for the live event handlers?',
      undefined,
      coordinatorRole,
    );
    const filename = await getValue(
      'What should the filename without extension for the SQL script (*.sql) and the config (*.env) be?',
      undefined,
      'failed-events',
    );

    const sqlOutput = createSetupScript({
      database,
      schema,
      table,
      coordinatorRole,
      captureRole,
    });
    await writeFile(`${filename}.sql`, sqlOutput);

    const envConfig = `# Select the variables that you want to adjust and copy them to your .ENV file/store
# You can leave/skip the config variables that are already fine.
# The defaults will be applied automatically for them.

${printFailedEventEnvVariables({ DB_SCHEMA: schema, DB_TABLE: table })}`;
    await writeFile(`${filename}.env`, envConfig);

    console.log(`File \x1b[92m${filename}\x1b[0m successfully created.`);
  } finally {
    rli.close();
  }
};

if (require.main === module) {
  dbSetupCli().catch((error) => {
    console.error(error);
    process.exitCode = 1;
  });
}
