import type { CstElement, CstNode, IToken } from 'chevrotain';
import type { SourceSpan } from '../core/types.js';
import type { NameRef } from './ast.js';

function isToken(el: CstElement): el is IToken {
  return 'image' in el;
}

function isNode(el: CstElement): el is CstNode {
  return 'children' in el;
}

export function childTokens(node: CstNode, name: string): IToken[] {
  return (node.children[name] ?? []).filter(isToken);
}

export function childNodes(node: CstNode, name: string): CstNode[] {
  return (node.children[name] ?? []).filter(isNode);
}

export function firstChildNode(node: CstNode, name: string): CstNode | undefined {
  return childNodes(node, name)[0];
}

export function tokenSpan(tok: IToken): SourceSpan {
  return {
    line: tok.startLine ?? 1,
    column: tok.startColumn ?? 1,
    length: tok.image.length,
    offset: tok.startOffset,
  };
}

export function nameRef(tok: IToken): NameRef {
  return { name: tok.image, span: tokenSpan(tok) };
}

// Requires the parser to run with nodeLocationTracking: 'full'
export function nodeSpan(node: CstNode): SourceSpan {
  const loc = node.location;
  // EOF-only nodes keep NaN offsets
  if (!loc || !Number.isFinite(loc.startOffset)) return { line: 1, column: 1, length: 1, offset: 0 };
  const end = Number.isFinite(loc.endOffset) ? (loc.endOffset ?? loc.startOffset) : loc.startOffset;
  return {
    line: loc.startLine ?? 1,
    column: loc.startColumn ?? 1,
    length: Math.max(1, end - loc.startOffset + 1),
    offset: loc.startOffset,
  };
}

export function nodeText(node: CstNode, text: string): string {
  const span = nodeSpan(node);
  return text.slice(span.offset, span.offset + span.length).replace(/\s+/g, ' ').trim();
}
