import { resolve } from 'node:path';
import { DEFAULT_CONFIG_FILE } from '../config/load-config.js';

export interface CliOptions {
  /** Absolute path of the YAML configuration */
  configPath: string;
  help: boolean;
}

export function parseCliOptions(args: readonly string[], cwd: string = process.cwd()): CliOptions {
  let configPath: string | undefined;
  let help = false;

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i] ?? '';
    switch (arg) {
      case '-c':
      case '--config': {
        const value = args[i + 1];
        if (value === undefined || value.startsWith('-')) {
          throw new Error(`Option ${arg} requires a file path`);
        }
        configPath = value;
        i += 1;
        break;
      }
      case '-h':
      case '--help':
        help = true;
        break;
      default:
        if (arg.startsWith('--config=')) {
          configPath = arg.slice('--config='.length);
          if (configPath === '') {
            throw new Error('Option --config requires a file path');
          }
        } else {
          throw new Error(`Unknown option: ${arg}`);
        }
    }
  }

  return {
    configPath: resolve(cwd, configPath ?? DEFAULT_CONFIG_FILE),
    help,
  };
}

export function printHelp(): void {
  console.log(`nfe-intake - NF-e watched-folder ingestion

Usage:
  nfe-intake [--config <file>]

Options:
  -c, --config <file>   Configuration file (default: ./${DEFAULT_CONFIG_FILE})
  -h, --help            Show this message

Environment:
  DATABASE_URL          Overrides processor.databaseUrl
`);
}
