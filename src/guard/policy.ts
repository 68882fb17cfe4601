/**
 * QueryGate - Policy Inputs
 *
 * Immutable schema whitelist and keyword denylist consumed by the rules.
 */

import { ConfigurationError, ParseAmbiguousError } from '../utils/types.js';

import { parseTableName } from './parser.js';
import { isComment } from './tokenizer.js';
import type { Token } from './types.js';

export const DEFAULT_FORBIDDEN_KEYWORDS: readonly string[] = Object.freeze([
  'DROP',
  'DELETE',
  'UPDATE',
  'INSERT',
  'ALTER',
  'TRUNCATE',
  'ATTACH',
  'PRAGMA',
  'EXEC',
  '--',
  '/*',
]);

const KEYWORD_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
const COMMENT_MARKERS = new Set(['--', '/*']);

// =============================================================================
// Schema Whitelist
// =============================================================================

function canonicalTableName(entry: string): string | null {
  try {
    return parseTableName(entry);
  } catch (error) {
    if (error instanceof ParseAmbiguousError) return null;
    throw error;
  }
}

/**
 * Set of table names a statement may reference. Names compare the way
 * PostgreSQL resolves them: unquoted names fold to lower case, quoted names
 * must match exactly. A qualified reference (schema.table) only matches an
 * equally qualified entry. An empty whitelist disables table checks.
 */
export class SchemaWhitelist {
  private readonly tables: ReadonlySet<string>;

  constructor(tables: Iterable<string> = []) {
    const canonical = new Set<string>();
    for (const table of tables) {
      if (table.trim().length === 0) continue;
      const name = canonicalTableName(table);
      if (name === null) {
        throw new ConfigurationError(`Invalid whitelist entry '${table}': expected a table name`);
      }
      canonical.add(name);
    }
    this.tables = canonical;
    Object.freeze(this);
  }

  get isEmpty(): boolean {
    return this.tables.size === 0;
  }

  get size(): number {
    return this.tables.size;
  }

  /**
   * @param table - canonical name as produced by the parser
   */
  permits(table: string): boolean {
    return this.tables.has(table);
  }

  toArray(): string[] {
    return [...this.tables].sort();
  }
}

// =============================================================================
// Keyword Denylist
// =============================================================================

/**
 * Forbidden keywords matched against standalone unquoted words, plus the
 * comment markers `--` and `/*` matched against comment tokens.
 */
export class KeywordDenylist {
  private readonly words: ReadonlySet<string>;
  private readonly markers: ReadonlySet<string>;

  constructor(entries: Iterable<string> = DEFAULT_FORBIDDEN_KEYWORDS) {
    const words = new Set<string>();
    const markers = new Set<string>();

    for (const raw of entries) {
      const entry = raw.trim();
      if (COMMENT_MARKERS.has(entry)) {
        markers.add(entry);
      } else if (KEYWORD_PATTERN.test(entry)) {
        words.add(entry.toUpperCase());
      } else {
        throw new ConfigurationError(
          `Invalid forbidden keyword '${raw}': expected a bare word, '--' or '/*'`
        );
      }
    }

    this.words = words;
    this.markers = markers;
    Object.freeze(this);
  }

  /**
   * The denylist entry a token trips, if any
   */
  match(token: Token): string | null {
    if (token.kind === 'word') {
      const word = token.text.toUpperCase();
      return this.words.has(word) ? word : null;
    }
    if (isComment(token)) {
      const marker = token.kind === 'line_comment' ? '--' : '/*';
      return this.markers.has(marker) ? marker : null;
    }
    return null;
  }

  toArray(): string[] {
    return [...this.words, ...this.markers];
  }
}
