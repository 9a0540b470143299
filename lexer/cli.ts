import { readFileSync } from 'node:fs';
import { Command } from 'commander';

import { dump, type DumpSink } from './dump.js';
import { builtinLanguage, builtinLanguages, isBuiltinLanguage, loadLanguageFile } from './languages/language-file.js';
import { logger } from './logger.js';
import type { Language } from './scanner/language.js';
import { createScanner } from './scanner/scanner.js';

export interface CliIO {
  readFile(path: string): string;
  stdout: DumpSink;
  stderr: DumpSink;
  setExitCode(code: number): void;
}

interface CliOptions {
  language: string;
  config?: string;
  sort?: boolean;
}

const ENCODING = 'utf-8';

export const processIO: CliIO = {
  readFile: path => readFileSync(path, ENCODING),
  stdout: process.stdout,
  stderr: process.stderr,
  setExitCode: code => { process.exitCode = code; },
};

export function createProgram(io: CliIO = processIO): Command {
  const program = new Command();

  program
    .name('lexer-scan')
    .description('Scan a source file and print one line per token')
    .argument('<file>', 'source file to scan')
    .option('-l, --language <name>', `built-in language (${builtinLanguages.join(', ')})`, 'lua')
    .option('-c, --config <path>', 'JSON language file, overrides --language')
    .option('--sort', 'order keywords and symbols by descending length')
    .configureOutput({
      writeOut: text => { io.stdout.write(text); },
      writeErr: text => { io.stderr.write(text); },
    })
    .action((file: string, options: CliOptions) => {
      let language: Language;
      let text: string;
      try {
        language = resolveLanguage(options);
        text = io.readFile(file);
      } catch (error) {
        logger.error(error instanceof Error ? error.message : String(error));
        io.setExitCode(2);
        return;
      }

      const result = createScanner(language).run(text);
      dump(result.buffer, io.stdout);

      if (!result.ok) {
        logger.error(`${file}:${result.error.message}`);
        io.setExitCode(1);
      }
    });

  return program;
}

function resolveLanguage(options: CliOptions): Language {
  const languageOptions = { sortByLength: options.sort === true };
  if (options.config !== undefined)
    return loadLanguageFile(options.config, languageOptions);
  if (!isBuiltinLanguage(options.language))
    throw new Error(`Unknown language "${options.language}", expected one of: ${builtinLanguages.join(', ')}`);
  return builtinLanguage(options.language, languageOptions);
}

export function main(argv: readonly string[] = process.argv, io?: CliIO): void {
  createProgram(io).parse([...argv]);
}
