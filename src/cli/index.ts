export { CliArgsSchema, parseArgs, toCommand } from './args';
export type { CliArgs, CliCommand, ParseArgsOptions } from './args';
