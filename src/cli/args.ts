import { z } from 'zod';
import { parseArgv } from 'zx';

import { InvalidInputError } from '../errors';
import type { Logger } from '../utils/logger';

const USAGE = 'Usage: nationality-lookup predict <name> | popular <country> [--limit=N] | prune';

export const CliArgsSchema = z.object({
  _: z.array(z.coerce.string()),
  limit: z.coerce.number().optional()
});

export type CliArgs = z.infer<typeof CliArgsSchema>;

export type CliCommand =
  | { command: 'predict'; name: string }
  | { command: 'popular'; countryCode: string; limit?: number }
  | { command: 'prune' };

const sanitizeArgs = (rawArgs: string[]): string[] => rawArgs.filter((arg) => arg !== '--');

export function toCommand(args: CliArgs): CliCommand {
  const [command, ...rest] = args._;

  switch (command) {
    case 'predict': {
      // unquoted multi-word names arrive as separate positionals
      const name = rest.join(' ');
      if (!name.trim()) {
        throw new InvalidInputError(`predict needs a name. ${USAGE}`);
      }
      return { command: 'predict', name };
    }
    case 'popular': {
      const [countryCode] = rest;
      if (countryCode === undefined || rest.length > 1) {
        throw new InvalidInputError(`popular needs exactly one country code. ${USAGE}`);
      }
      return args.limit === undefined
        ? { command: 'popular', countryCode }
        : { command: 'popular', countryCode, limit: args.limit };
    }
    case 'prune':
      return { command: 'prune' };
    default:
      throw new InvalidInputError(command ? `Unknown command "${command}". ${USAGE}` : USAGE);
  }
}

export interface ParseArgsOptions {
  logger: Logger;
  rawArgs?: string[];
}

export function parseArgs({ logger, rawArgs }: ParseArgsOptions): CliCommand {
  logger.debug('Parsing CLI arguments');
  const parsedArgs = parseArgv(sanitizeArgs(rawArgs ?? process.argv.slice(2)), { string: ['_'] });

  const result = CliArgsSchema.safeParse(parsedArgs);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new InvalidInputError(`Invalid arguments: ${issues}`);
  }

  const command = toCommand(result.data);
  logger.debug('Parsed args', { ...command });
  return command;
}
