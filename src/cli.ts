#!/usr/bin/env node
import fs from 'fs-extra';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { convertHtml, convertMarkdown, ConvertOptions } from './convert.js';
import { helpFileName, sourceFormat } from './loader.js';
import { ConversionError } from './errors.js';
import { configDir, getConfig, loadConfig } from './config.js';
import { Logger } from './types.js';
import { silentLogger } from './tree.js';

// Standard output carries the help file, so diagnostics go to standard error.
const stderrLogger: Logger = {
  debug: (message, ...args) => console.error(message, ...args),
  info: (message, ...args) => console.error(message, ...args),
  warn: (message, ...args) => console.error(message, ...args),
};

export const USAGE = `Usage: vimdocgen [OPTIONS] INPUT

Convert an HTML or Markdown document to a Vim help file, written to
standard output.

Options:
  --file=NAME     name of the help file (default: derived from INPUT)
  --title=STR     title of the help file (default: first <title> or <h1>)
  --selector=CSS  element holding the document text (default: #content)
  --ignore=CSS    remove elements matching CSS (may be repeated)
  --verbose       log conversion details to standard error
  --help          show this message`;

/**
 * Parsed command line
 */
export interface CliArgs {
  input?: string;
  file?: string;
  title?: string;
  selector?: string;
  ignore: string[];
  verbose: boolean;
  help: boolean;
}

/**
 * Parse `--name=value` style arguments
 */
export function parseCliArgs(args: readonly string[]): CliArgs {
  const parsed: CliArgs = { ignore: [], verbose: false, help: false };

  for (const arg of args) {
    if (arg === '--help' || arg === '-h') {
      parsed.help = true;
    } else if (arg === '--verbose' || arg === '-v') {
      parsed.verbose = true;
    } else if (arg.startsWith('--')) {
      const eq = arg.indexOf('=');
      const name = eq < 0 ? arg.slice(2) : arg.slice(2, eq);
      const value = eq < 0 ? '' : arg.slice(eq + 1);
      switch (name) {
        case 'file':
          parsed.file = value;
          break;
        case 'title':
          parsed.title = value;
          break;
        case 'selector':
          parsed.selector = value;
          break;
        case 'ignore':
          parsed.ignore.push(value);
          break;
        default:
          throw new ConversionError(`Unknown option: ${arg}`);
      }
    } else if (parsed.input === undefined) {
      parsed.input = arg;
    } else {
      throw new ConversionError(`Unexpected argument: ${arg}`);
    }
  }

  return parsed;
}

/**
 * Conversion options for a command line, on top of the configured defaults
 */
export function cliOptions(args: CliArgs): ConvertOptions {
  const defaults = getConfig().conversion;
  const options: ConvertOptions = {
    ...defaults,
    embeddedFilename: args.file ?? (args.input ? helpFileName(args.input) : undefined),
    title: args.title,
    selectorsToIgnore: [...defaults.selectorsToIgnore, ...args.ignore],
    logger: args.verbose ? stderrLogger : undefined,
  };
  if (args.selector) {
    options.contentSelector = args.selector;
  }
  return options;
}

async function main(): Promise<number> {
  const args = parseCliArgs(process.argv.slice(2));
  if (args.help || !args.input) {
    console.log(USAGE);
    return args.help ? 0 : 1;
  }

  await loadConfig(configDir, args.verbose ? stderrLogger : silentLogger);
  const source = await fs.readFile(args.input, 'utf-8');
  const options = cliOptions(args);
  const output = sourceFormat(args.input) === 'markdown'
    ? convertMarkdown(source, options)
    : convertHtml(source, options);
  process.stdout.write(output + '\n');
  return 0;
}

if (process.argv[1] && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  main().then(
    code => { process.exitCode = code; },
    err => {
      console.error(err instanceof Error ? err.message : err);
      process.exitCode = 1;
    },
  );
}
