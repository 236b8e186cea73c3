/**
 * Declaration file and string parser.
 *
 * Reads YAML or JSON service declarations and returns the raw parsed object
 * (before Zod validation). Format is determined by file extension for
 * file-based loading, or explicitly specified for string-based loading.
 */

import { existsSync, readFileSync } from 'node:fs'
import { extname, join, resolve } from 'node:path'
import { load as parse } from 'js-yaml'
import { ConfigParseError } from '../../core/errors.js'
import { DEFAULT_CONFIG_FILENAMES } from '../config/defaults.js'

// ---------------------------------------------------------------------------
// Format detection
// ---------------------------------------------------------------------------

export type DeclarationFormat = 'yaml' | 'json'

export function detectFormat(filePath: string): DeclarationFormat {
  const ext = extname(filePath).toLowerCase()
  if (ext === '.json') {
    return 'json'
  }
  // .yaml, .yml and anything else are read as YAML (a superset of JSON)
  return 'yaml'
}

// ---------------------------------------------------------------------------
// parseDeclarationString
// ---------------------------------------------------------------------------

/**
 * Parse a service declaration from a string (YAML or JSON).
 *
 * @throws {ConfigParseError} on syntax errors
 */
export function parseDeclarationString(content: string, format: DeclarationFormat): unknown {
  if (format === 'json') {
    try {
      return JSON.parse(content) as unknown
    } catch (err) {
      const original = err instanceof Error ? err : new Error(String(err))
      throw new ConfigParseError(`JSON parse error: ${original.message}`, { format: 'json' })
    }
  }

  try {
    return parse(content)
  } catch (err) {
    const original = err instanceof Error ? err : new Error(String(err))
    throw new ConfigParseError(`YAML parse error: ${original.message}`, { format: 'yaml' })
  }
}

// ---------------------------------------------------------------------------
// parseDeclarationFile
// ---------------------------------------------------------------------------

/**
 * Read a declaration file and parse its contents.
 *
 * @throws {ConfigParseError} on file read errors or syntax errors
 */
export function parseDeclarationFile(filePath: string): unknown {
  let content: string

  try {
    content = readFileSync(filePath, 'utf-8')
  } catch (err) {
    const original = err instanceof Error ? err : new Error(String(err))
    throw new ConfigParseError(`Failed to read declaration file: ${original.message}`, {
      filePath,
    })
  }

  const format = detectFormat(filePath)

  try {
    return parseDeclarationString(content, format)
  } catch (err) {
    if (err instanceof ConfigParseError) {
      throw new ConfigParseError(`${filePath}: ${err.message}`, { filePath, format })
    }
    throw err
  }
}

// ---------------------------------------------------------------------------
// findDeclarationFile
// ---------------------------------------------------------------------------

/**
 * Locate the declaration file in a project root by trying the default names.
 * Returns null when none exists.
 */
export function findDeclarationFile(projectRoot: string): string | null {
  for (const name of DEFAULT_CONFIG_FILENAMES) {
    const candidate = join(projectRoot, name)
    if (existsSync(candidate)) return candidate
  }
  return null
}

/**
 * Absolute path of the declaration to load: `configPath` when given
 * (relative to the project root), otherwise the first default name present.
 * @throws {ConfigParseError} when no declaration can be found
 */
export function resolveDeclarationPath(projectRoot: string, configPath?: string): string {
  if (configPath !== undefined) return resolve(projectRoot, configPath)
  const found = findDeclarationFile(projectRoot)
  if (found === null) {
    throw new ConfigParseError(
      `No service declaration found in ${projectRoot} (looked for ${DEFAULT_CONFIG_FILENAMES.join(', ')})`,
      { projectRoot },
    )
  }
  return resolve(found)
}
