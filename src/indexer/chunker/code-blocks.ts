/**
 * Code Block Extractor
 *
 * Uses the marked lexer to pull fenced code blocks out of markdown,
 * together with the nearest heading and the prose on either side. The
 * pipeline stores these in `code_examples` when code extraction is on.
 */

import { marked, type Token, type Tokens } from 'marked';

import type { CodeBlock, CodeBlockOptions } from './types.js';

const DEFAULT_MIN_LENGTH = 1000;
const DEFAULT_CONTEXT_LENGTH = 1000;

function isCode(token: Token): token is Tokens.Code {
  return token.type === 'code';
}

function isHeading(token: Token): token is Tokens.Heading {
  return token.type === 'heading';
}

/** Block tokens whose raw text counts as surrounding prose */
function isProse(token: Token): boolean {
  return (
    token.type === 'paragraph' ||
    token.type === 'text' ||
    token.type === 'list' ||
    token.type === 'blockquote' ||
    token.type === 'table'
  );
}

/**
 * Prose before token `index`, nearest last, cut to `limit` characters from the end.
 */
function proseBefore(tokens: Token[], index: number, limit: number): string {
  const parts: string[] = [];
  let length = 0;
  for (let i = index - 1; i >= 0 && length < limit; i--) {
    const token = tokens[i];
    if (token === undefined || isCode(token) || isHeading(token)) break;
    if (isProse(token)) {
      const text = token.raw.trim();
      parts.unshift(text);
      length += text.length;
    }
  }
  const joined = parts.join('\n\n');
  return joined.length > limit ? joined.slice(joined.length - limit) : joined;
}

/**
 * Prose after token `index`, cut to `limit` characters.
 */
function proseAfter(tokens: Token[], index: number, limit: number): string {
  const parts: string[] = [];
  let length = 0;
  for (let i = index + 1; i < tokens.length && length < limit; i++) {
    const token = tokens[i];
    if (token === undefined || isCode(token) || isHeading(token)) break;
    if (isProse(token)) {
      const text = token.raw.trim();
      parts.push(text);
      length += text.length;
    }
  }
  return parts.join('\n\n').slice(0, limit);
}

/**
 * Extract fenced code blocks of at least `minLength` characters.
 *
 * Indented code blocks are ignored: without a fence they are too often
 * just quoted output.
 */
export function extractCodeBlocks(markdown: string, options: CodeBlockOptions = {}): CodeBlock[] {
  const minLength = options.minLength ?? DEFAULT_MIN_LENGTH;
  const contextLength = options.contextLength ?? DEFAULT_CONTEXT_LENGTH;

  const tokens: Token[] = marked.lexer(markdown);
  const blocks: CodeBlock[] = [];
  let heading: string | undefined;

  tokens.forEach((token, index) => {
    if (isHeading(token)) {
      heading = token.text;
      return;
    }
    if (!isCode(token) || token.codeBlockStyle === 'indented') return;

    const code = token.text.trim();
    if (code.length < minLength) return;

    blocks.push({
      code,
      language: token.lang?.trim().split(/\s+/)[0] || 'text',
      heading,
      contextBefore: proseBefore(tokens, index, contextLength),
      contextAfter: proseAfter(tokens, index, contextLength),
    });
  });

  return blocks;
}

/**
 * One-line description of a code block built from its surroundings.
 */
export function summarizeCodeBlock(block: CodeBlock): string {
  const firstSentence = block.contextBefore.split(/(?<=[.!?])\s/)[0]?.trim() ?? '';
  const subject = block.heading ?? firstSentence;
  const label = block.language === 'text' ? 'Code example' : `${block.language} example`;
  return subject ? `${label}: ${subject}` : label;
}
