/**
 * Turn document text into a ConfigNode tree.
 *
 * JSON and YAML are both accepted: a document whose first non-whitespace
 * character is `{` is read as JSON, anything else as YAML. The first syntax
 * problem aborts reading.
 */

import { LineCounter, parseDocument } from 'yaml';
import type { Result } from 'neverthrow';
import { ok, err } from 'neverthrow';
import type { ParseError } from '../core/errors/config-error.js';
import { ConfigErr } from '../core/errors/factories.js';
import { ConfigNode } from './config-node.js';

export type DocumentFormat = 'json' | 'yaml';

export function detectFormat(text: string): DocumentFormat {
  return text.trimStart().startsWith('{') ? 'json' : 'yaml';
}

export function readDocument(text: string, source: string): Result<ConfigNode, ParseError> {
  const format = detectFormat(text);
  const lineCounter = new LineCounter();
  const doc = parseDocument(text, {
    lineCounter,
    prettyErrors: false,
    schema: format === 'json' ? 'json' : 'core',
  });

  const [first] = doc.errors;
  if (first !== undefined) {
    const offset = first.pos[0];
    const { line, col } = lineCounter.linePos(offset);
    return err(ConfigErr.parseError(source, format, first.message, { line, column: col, offset }));
  }

  const root = new ConfigNode(doc.contents, '', {
    lineCounter,
    resolveAlias: (alias) => alias.resolve(doc),
  });

  if (root.kind !== 'map' && !root.isNull) {
    const position = root.position;
    return err(ConfigErr.parseError(source, format, 'expected a mapping at the top of the document', position));
  }

  return ok(root);
}
