import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';
import { CONFIG_FILE_NAME } from '../types';
import { InvalidArgumentError } from '../shared/errors';
import { sampleConfigJson } from '../config/projectConfig';

export function runConfigSample(): void {
  process.stdout.write(sampleConfigJson());
}

/** Writes a sample config into `directory`. Refuses to overwrite unless forced. */
export function runConfigInit(directory: string, force: boolean): string {
  const target = path.join(path.resolve(directory), CONFIG_FILE_NAME);

  if (fs.existsSync(target) && !force) {
    throw new InvalidArgumentError(
      `${CONFIG_FILE_NAME} already exists in ${path.dirname(target)}. Use --force to overwrite.`,
      'force',
      'false',
    );
  }

  fs.writeFileSync(target, sampleConfigJson(), 'utf-8');
  console.log(`  ${chalk.green('✓')} Wrote ${target}`);
  return target;
}
