import { performance } from 'node:perf_hooks';
import {
  findChild,
  parseDocumentTree,
  serializeDocumentTree,
  setTextContent,
  tagMatches,
  textContent,
  type DocumentTree,
  type XmlElementNode
} from './tree';
import { XmlParseError, type CleanOptions, type CleaningOutcome, type ScopedRules } from './types';
import { POSITION_STATUS_RULES } from './vocabulary';

function clearBlockFields(block: XmlElementNode, rules: ScopedRules, matchLocalNames: boolean): number {
  let cleared = 0;

  for (const rule of rules.fields) {
    const field = findChild(block, rule.field, matchLocalNames);
    if (field && textContent(field) === rule.sentinel) {
      setTextContent(field, '');
      cleared += 1;
    }
  }

  return cleared;
}

// Pre-order, so a block is handled before anything nested inside it; content
// removed by a clear is never visited.
function walkBlocks(element: XmlElementNode, rules: ScopedRules, matchLocalNames: boolean): number {
  let cleared = 0;

  if (tagMatches(element, rules.container, matchLocalNames)) {
    cleared += clearBlockFields(element, rules, matchLocalNames);
  }

  for (const child of element.children) {
    if (child.kind === 'element') {
      cleared += walkBlocks(child, rules, matchLocalNames);
    }
  }

  return cleared;
}

export function clearScopedFields(tree: DocumentTree, rules: ScopedRules, options: CleanOptions = {}): number {
  return walkBlocks(tree.root, rules, options.matchLocalNames ?? false);
}

export function cleanScopedFields(text: string, rules: ScopedRules, options: CleanOptions = {}): CleaningOutcome {
  const startedAt = performance.now();

  let tree: DocumentTree;
  try {
    tree = parseDocumentTree(text);
  } catch (error) {
    if (error instanceof XmlParseError) {
      return { ok: false, reason: error.message, durationMs: performance.now() - startedAt };
    }
    throw error;
  }

  const modifications = clearScopedFields(tree, rules, options);
  const cleanedText = modifications > 0 ? serializeDocumentTree(tree) : text;

  return {
    ok: true,
    cleanedText,
    modifications,
    durationMs: performance.now() - startedAt
  };
}

/** Empties `Code` = `6A` and `Description` = `Ouvriers` inside every `PositionStatus`. */
export function cleanPositionStatus(text: string, options: CleanOptions = {}): CleaningOutcome {
  return cleanScopedFields(text, POSITION_STATUS_RULES, options);
}
