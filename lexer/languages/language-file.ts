/**
 * Language files: JSON documents describing a language's vocabulary.
 *
 * ```json
 * {
 *   "name": "lua",
 *   "keywords": ["elseif", "else", "end"],
 *   "symbols": ["..", "."],
 *   "singleLineComment": "--",
 *   "multiLineComment": { "start": "--[[", "end": "]]" }
 * }
 * ```
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';

import { logger } from '../logger.js';
import { defineLanguage, type Language, type LanguageConfig, type LanguageOptions } from '../scanner/language.js';

const marker = z.string().min(1);

export const languageConfigSchema = z.object({
  name: z.string().min(1).optional(),
  keywords: z.array(marker),
  symbols: z.array(marker),
  singleLineComment: marker.optional(),
  multiLineComment: z.object({ start: marker, end: marker }).optional(),
});

export const builtinLanguages = ['lua'] as const;
export type BuiltinLanguageName = typeof builtinLanguages[number];

export function isBuiltinLanguage(name: string): name is BuiltinLanguageName {
  return builtinLanguages.some(builtin => builtin === name);
}

/** Validate already-parsed JSON as a language config. */
export function parseLanguageConfig(json: unknown, origin = 'language config'): LanguageConfig {
  const parsed = languageConfigSchema.safeParse(json);
  if (!parsed.success)
    throw new Error(`Invalid ${origin}:\n${z.prettifyError(parsed.error)}`);
  return parsed.data;
}

export function readLanguageConfig(path: string | URL): LanguageConfig {
  const origin = String(path);
  let json: unknown;
  try {
    json = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new Error(`Cannot read language file ${origin}`, { cause: error });
  }
  return parseLanguageConfig(json, `language file ${origin}`);
}

export function loadLanguageFile(path: string | URL, options?: LanguageOptions): Language {
  const config = readLanguageConfig(path);
  logger.debug(`loaded language ${config.name ?? String(path)}: ${config.keywords.length} keywords, ${config.symbols.length} symbols`);
  return defineLanguage(config, options);
}

/** Load one of the language files shipped next to this module. */
export function builtinLanguage(name: BuiltinLanguageName, options?: LanguageOptions): Language {
  return loadLanguageFile(new URL(`./${name}.json`, import.meta.url), options);
}
