import { confirm } from '@inquirer/prompts';
import chalk from 'chalk';

/** Asks whether an existing model file should be overwritten. */
export async function promptRegenerateModel(relativePath: string): Promise<boolean> {
  console.log(chalk.yellow(`\n  A model already exists at ${relativePath}\n`));

  return confirm({
    message: 'Regenerate the model? (other artifacts are always regenerated)',
    default: false,
  });
}
