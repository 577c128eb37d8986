/**
 * Command routing and help text for the annotation generator CLI.
 */

import { getEnvVarDocumentation, type EnvRecord } from '../config/env.js';
import { createCliApp, DEFAULT_CONFIG_FILE } from './app.js';
import { handleGenerateCommand } from './commands/generate.js';
import { getVersionFromPackageJson, handleVersionCommand } from './commands/version.js';
import type { CliCommandResult } from './types.js';

/**
 * Displays usage information.
 */
function showHelp(): void {
  const helpText = `
API annotation generator v${getVersionFromPackageJson()}

USAGE:
  annotate <command> [options]

COMMANDS:
  generate    Generate annotation files from module descriptors
  help        Show this help message
  version     Show version information

OPTIONS:
  --help, -h     Show help for a command
  --version, -v  Show version information

EXAMPLES:
  annotate generate modules/*.toml
  annotate generate gui.json go.json --out build/api --version 1.9.0
  annotate help generate
`;
  console.log(helpText);
}

/**
 * Shows help for a specific command.
 *
 * @param commandName - The command name to show help for.
 * @returns Whether the command exists.
 */
function showHelpForCommand(commandName: string): boolean {
  if (commandName !== 'generate') {
    console.error(`Unknown command: ${commandName}`);
    console.error('\nRun "annotate help" to see all available commands.');
    return false;
  }

  const envVars = getEnvVarDocumentation()
    .map((line) => `  ${line}`)
    .join('\n');

  console.log(`
USAGE: annotate generate <module files...> [options]

Reads module descriptors (.toml or .json) and writes one annotation file
per namespace. Settings are read from ${DEFAULT_CONFIG_FILE} when present.

OPTIONS:
  --config, -c <file>   Configuration file (default: ${DEFAULT_CONFIG_FILE})
  --out, -o <dir>       Output folder, overrides output.folder
  --version <x.y.z>     Version printed in every file header
  --strict              Fail on the first unknown type
  --dry-run             Generate without writing, list the files

ENVIRONMENT:
${envVars}

EXAMPLES:
  annotate generate modules/gui.toml modules/go.toml
  annotate generate api.json --strict --dry-run
`);
  return true;
}

/**
 * Shows error message with help.
 *
 * @param message - The error message to display.
 */
function showError(message: string): void {
  console.error(`Error: ${message}`);
  console.error('\nRun "annotate help" for usage information.');
}

/**
 * Runs one CLI invocation.
 *
 * @param argv - Arguments after the program name.
 * @param env - Environment to read overrides from.
 * @returns The command result.
 */
export async function runCli(
  argv: readonly string[],
  env: EnvRecord = process.env
): Promise<CliCommandResult> {
  const command = argv[0] ?? '';
  const commandArgs = argv.slice(1);

  switch (command) {
    case '':
    case 'help':
    case '--help':
    case '-h': {
      const topic = commandArgs[0];
      if (topic === undefined) {
        showHelp();
        return { exitCode: 0 };
      }
      return { exitCode: showHelpForCommand(topic) ? 0 : 1 };
    }

    case 'version':
    case '--version':
    case '-v':
      return handleVersionCommand();

    case 'generate':
      if (commandArgs.includes('--help') || commandArgs.includes('-h')) {
        showHelpForCommand('generate');
        return { exitCode: 0 };
      }
      return handleGenerateCommand(createCliApp({}, commandArgs, env));

    default:
      showError(`Unknown command: ${command}`);
      return { exitCode: 1 };
  }
}
