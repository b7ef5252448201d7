/**
 * Review rendering: human-readable text or a structured document.
 *
 * Both modes share the same pipeline: filter (unresolved only), drop empty
 * files, attach source context, then format.
 *
 * @module review-renderer
 */

import { DEFAULT_WINDOW_SIZE, readContext, type ContextLine } from './context-reader.ts';
import { InvalidModeError } from './errors.ts';
import type { Review, ReviewComment, ReviewFile } from './review-model.ts';

// ────────────────────────────────────────────────────────────────
// Types
// ────────────────────────────────────────────────────────────────

export type RenderMode = 'text' | 'json';

export type ContextLookup = (
  filePath: string,
  line: number | null,
  windowSize: number
) => ContextLine[];

export interface RenderOptions {
  /** Keep only comments whose thread is unresolved */
  unresolvedOnly?: boolean;
  /** Source context provider (default: readContext relative to cwd) */
  contextReader?: ContextLookup;
  /** Lines shown either side of the commented line (default: 2) */
  windowSize?: number;
}

export interface RenderedComment {
  comment: ReviewComment;
  context: ContextLine[];
}

/** A file with its comments and the source window around each of them */
export interface RenderedBlock {
  path: string;
  comments: RenderedComment[];
}

// Structured output. Field names are a contract for CI consumers.

export interface ContextLineDocument {
  line: number;
  text: string;
}

export interface CommentDocument {
  id: string | null;
  line: number | null;
  author: string;
  message: string;
  resolved: boolean;
  inReplyTo: string | null;
  patchSet: number | string | null;
  context: ContextLineDocument[];
}

export interface FileDocument {
  path: string;
  comments: CommentDocument[];
}

export interface ReviewDocument {
  changeNumber: number | string;
  subject: string;
  project: string;
  unresolvedOnly: boolean;
  commentCount: number;
  files: FileDocument[];
}

const HEADER_RULE = '='.repeat(70);
const FILE_RULE = '-'.repeat(40);

export const NO_COMMENTS_MESSAGE = 'No file comments found in review';

// ────────────────────────────────────────────────────────────────
// Shared pipeline
// ────────────────────────────────────────────────────────────────

/**
 * Gerrit's pseudo files (/COMMIT_MSG, /MERGE_LIST, /PATCHSET_LEVEL) have no
 * counterpart in the working tree.
 */
function isMagicPath(path: string): boolean {
  return path.startsWith('/');
}

/**
 * Drop resolved comments when `unresolvedOnly` is set, then drop files with
 * nothing left.
 */
export function filterUnresolved(
  files: readonly ReviewFile[],
  unresolvedOnly: boolean
): ReviewFile[] {
  return files
    .map((file) =>
      unresolvedOnly
        ? { path: file.path, comments: file.comments.filter((c) => !c.resolved) }
        : file
    )
    .filter((file) => file.comments.length > 0);
}

/**
 * Build the render blocks for a review: filtered files, each comment paired
 * with its source window.
 */
export function buildBlocks(review: Review, options: RenderOptions = {}): RenderedBlock[] {
  const lookup = options.contextReader ?? ((path, line, size) => readContext(path, line, size));
  const windowSize = options.windowSize ?? DEFAULT_WINDOW_SIZE;

  return filterUnresolved(review.files, options.unresolvedOnly ?? false).map((file) => ({
    path: file.path,
    comments: file.comments.map((comment) => ({
      comment,
      context:
        comment.line === null || isMagicPath(file.path)
          ? []
          : lookup(file.path, comment.line, windowSize),
    })),
  }));
}

function countBlockComments(blocks: readonly RenderedBlock[]): number {
  return blocks.reduce((total, block) => total + block.comments.length, 0);
}

// ────────────────────────────────────────────────────────────────
// Text mode
// ────────────────────────────────────────────────────────────────

function formatCommentLines({ comment, context }: RenderedComment): string[] {
  const label = comment.line === null ? ' FILE' : `L${String(comment.line).padStart(4)}`;
  const status = comment.resolved ? '' : ' [UNRESOLVED]';

  const lines = ['', `${label} | ${comment.author}${status}`];
  for (const messageLine of comment.message.split(/\r\n|\r|\n/)) {
    lines.push(`     | ${messageLine}`);
  }

  if (context.length > 0) {
    lines.push('');
    for (const { lineNumber, text } of context) {
      const marker = lineNumber === comment.line ? '>>>' : '   ';
      lines.push(`     ${String(lineNumber).padStart(4)} ${marker} ${text}`.trimEnd());
    }
  }

  return lines;
}

/**
 * Render a review as text for the terminal.
 *
 * @example
 * ```
 * ======================================================================
 * Review #12345
 * Fix widget rendering
 * Project: widgets
 * Comments: 1
 * ======================================================================
 *
 * src/widget.ts
 * ----------------------------------------
 *
 * L  10 | Reviewer One [UNRESOLVED]
 *      | Please fix this
 * ```
 */
export function renderText(review: Review, options: RenderOptions = {}): string {
  const blocks = buildBlocks(review, options);
  const total = countBlockComments(blocks);

  if (total === 0) {
    return NO_COMMENTS_MESSAGE;
  }

  const countLabel = options.unresolvedOnly ? 'Unresolved Comments' : 'Comments';
  const lines = [
    '',
    HEADER_RULE,
    `Review #${review.changeNumber}`,
    review.subject,
    `Project: ${review.project}`,
    `${countLabel}: ${total}`,
    HEADER_RULE,
  ];

  for (const block of blocks) {
    lines.push('', block.path, FILE_RULE);
    for (const rendered of block.comments) {
      lines.push(...formatCommentLines(rendered));
    }
  }

  return lines.join('\n');
}

// ────────────────────────────────────────────────────────────────
// Structured mode
// ────────────────────────────────────────────────────────────────

function toCommentDocument({ comment, context }: RenderedComment): CommentDocument {
  return {
    id: comment.id,
    line: comment.line,
    author: comment.author,
    message: comment.message,
    resolved: comment.resolved,
    inReplyTo: comment.inReplyTo,
    patchSet: comment.patchSet,
    context: context.map(({ lineNumber, text }) => ({ line: lineNumber, text })),
  };
}

/**
 * Render a review as a plain document, ready for JSON.stringify.
 */
export function renderDocument(review: Review, options: RenderOptions = {}): ReviewDocument {
  const blocks = buildBlocks(review, options);

  return {
    changeNumber: review.changeNumber,
    subject: review.subject,
    project: review.project,
    unresolvedOnly: options.unresolvedOnly ?? false,
    commentCount: countBlockComments(blocks),
    files: blocks.map((block) => ({
      path: block.path,
      comments: block.comments.map(toCommentDocument),
    })),
  };
}

// ────────────────────────────────────────────────────────────────
// Dispatcher
// ────────────────────────────────────────────────────────────────

/**
 * Render a review in the requested mode.
 *
 * @throws InvalidModeError when `mode` is neither "text" nor "json"
 */
export function render(review: Review, mode: 'text', options?: RenderOptions): string;
export function render(review: Review, mode: 'json', options?: RenderOptions): ReviewDocument;
export function render(review: Review, mode: string, options?: RenderOptions): string | ReviewDocument;
export function render(
  review: Review,
  mode: string,
  options: RenderOptions = {}
): string | ReviewDocument {
  if (mode === 'text') {
    return renderText(review, options);
  }
  if (mode === 'json') {
    return renderDocument(review, options);
  }
  throw new InvalidModeError(mode);
}
