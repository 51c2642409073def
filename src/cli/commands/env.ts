/**
 * Env CLI Command
 *
 * List every configuration environment variable with its default.
 */

import { Command } from 'commander';
import { z } from 'zod';
import { configRegistry } from '../../config/registry/index.js';
import { getAllEnvVars } from '../../config/registry/schema-builder.js';
import { formatOutput } from '../utils/output.js';
import { typedAction } from '../utils/typed-action.js';

export function addEnvCommand(program: Command): void {
  program
    .command('env')
    .description('List configuration environment variables')
    .action(
      typedAction(z.object({}), async (_options, globalOpts) => {
        const variables = getAllEnvVars(configRegistry)
          .filter((v) => v.envKey !== '')
          .map((v) => ({
            envKey: v.envKey,
            section: v.section,
            type: v.type,
            default: v.sensitive ? '***' : v.defaultValue,
            current: v.sensitive ? undefined : process.env[v.envKey],
            description: v.description,
          }));
        console.log(formatOutput({ count: variables.length, variables }, globalOpts.format));
      })
    );
}
