/**
 * Comment model: turns raw Gerrit query JSON into a frozen Review.
 *
 * Input is the output of `gerrit query --format=JSON --patch-sets --comments`.
 * Gerrit prints one object per change followed by a stats row; only the
 * first complete JSON value is used.
 *
 * @module review-model
 */

import { InvalidCommentError, MalformedInputError, errorMessage } from './errors.ts';
import * as log from './logging.ts';
import { createLazyValidator, formatSchemaErrors } from './schema-validator.ts';
import { computeThreadResolution, type ThreadMember } from './thread-resolution.ts';

// ────────────────────────────────────────────────────────────────
// Types
// ────────────────────────────────────────────────────────────────

export interface ReviewComment {
  /** Gerrit comment id (null when the payload has none) */
  readonly id: string | null;
  /** 1-based line in the current revision; null for file-level comments */
  readonly line: number | null;
  readonly author: string;
  readonly message: string;
  /** Derived from the comment's thread, not the record alone */
  readonly resolved: boolean;
  /** Id of the parent comment for replies */
  readonly inReplyTo: string | null;
  /** Patch set the comment was made on, when known */
  readonly patchSet: number | string | null;
}

export interface ReviewFile {
  readonly path: string;
  readonly comments: readonly ReviewComment[];
}

export interface Review {
  readonly changeNumber: number | string;
  readonly subject: string;
  readonly project: string;
  readonly files: readonly ReviewFile[];
}

export interface ParseReviewOptions {
  /** Called for each comment record that is skipped (default: log a warning) */
  onInvalidComment?: (err: InvalidCommentError) => void;
}

// Raw payload shapes, as accepted by schemas/gerrit-*.schema.json

interface RawReviewer {
  name: string;
  email?: string;
  username?: string;
}

interface RawComment {
  file: string;
  line?: number;
  reviewer: RawReviewer;
  message: string;
  unresolved?: boolean;
  id?: string;
  inReplyTo?: string;
  in_reply_to?: string;
}

interface RawPatchSet {
  number?: number | string;
  comments?: unknown[];
}

interface RawChange {
  number: number | string;
  subject: string;
  project?: string;
  patchSets?: RawPatchSet[];
}

interface ValidComment {
  raw: RawComment;
  patchSet: number | string | null;
  /** Position of the record among all thread members */
  member: number;
}

interface CollectedComments {
  valid: ValidComment[];
  /** Reply links of every record, skipped ones included */
  members: ThreadMember[];
}

const getChangeValidator = createLazyValidator<RawChange>('gerrit-change');
const getCommentValidator = createLazyValidator<RawComment>('gerrit-comment');

// ────────────────────────────────────────────────────────────────
// JSON extraction
// ────────────────────────────────────────────────────────────────

/**
 * Find where the first top-level object or array in `text` ends.
 * Returns -1 when it is never closed.
 */
function findValueEnd(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (ch === '\\') {
        escaped = true;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === '{' || ch === '[') {
      depth++;
    } else if (ch === '}' || ch === ']') {
      depth--;
      if (depth === 0) {
        return i + 1;
      }
    }
  }

  return -1;
}

/**
 * Parse the first complete JSON value in `text`, ignoring anything after it
 * (such as the stats row Gerrit appends to query output).
 *
 * @throws MalformedInputError when the text does not start with valid JSON
 */
export function extractFirstJsonValue(text: string): unknown {
  const start = text.search(/\S/);
  if (start === -1) {
    throw new MalformedInputError('Invalid JSON: input is empty');
  }

  const opener = text[start];
  const end = opener === '{' || opener === '[' ? findValueEnd(text, start) : text.length;
  const candidate = text.slice(start, end === -1 ? text.length : end);

  try {
    return JSON.parse(candidate);
  } catch (err) {
    throw new MalformedInputError(`Invalid JSON: ${errorMessage(err)}`, { cause: err });
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ────────────────────────────────────────────────────────────────
// Parsing
// ────────────────────────────────────────────────────────────────

function validateChange(value: unknown): RawChange {
  if (isRecord(value) && value.type === 'stats') {
    throw new MalformedInputError('No changes found: the query returned only statistics');
  }

  const validate = getChangeValidator();
  if (!validate(value)) {
    throw new MalformedInputError(
      `Invalid review payload: ${formatSchemaErrors(validate.errors)}`
    );
  }
  return value;
}

/**
 * Reply links of a record that failed validation. The record still joins its
 * thread, without a status, so replies to it reach the root.
 */
function linksOf(record: unknown): ThreadMember {
  if (!isRecord(record)) return {};
  const { id } = record;
  const parent = record.inReplyTo ?? record.in_reply_to;
  return {
    id: typeof id === 'string' ? id : undefined,
    inReplyTo: typeof parent === 'string' ? parent : undefined,
  };
}

/**
 * Validate every comment record across all patch sets, in payload order.
 * Invalid records are reported through `onInvalid` and dropped from the
 * comments, but keep their place in reply threads.
 */
function collectComments(
  change: RawChange,
  onInvalid: (err: InvalidCommentError) => void
): CollectedComments {
  const validate = getCommentValidator();
  const valid: ValidComment[] = [];
  const members: ThreadMember[] = [];

  for (const patchSet of change.patchSets ?? []) {
    for (const record of patchSet.comments ?? []) {
      const index = members.length;
      if (validate(record)) {
        valid.push({ raw: record, patchSet: patchSet.number ?? null, member: index });
        members.push({
          id: record.id,
          inReplyTo: record.inReplyTo ?? record.in_reply_to,
          unresolved: record.unresolved,
        });
      } else {
        onInvalid(new InvalidCommentError(index, formatSchemaErrors(validate.errors)));
        members.push(linksOf(record));
      }
    }
  }

  return { valid, members };
}

function toReviewComment(comment: ValidComment, resolved: boolean): ReviewComment {
  const { raw } = comment;
  return Object.freeze({
    id: raw.id ?? null,
    line: raw.line !== undefined && raw.line > 0 ? raw.line : null,
    author: raw.reviewer.name,
    message: raw.message,
    resolved,
    inReplyTo: raw.inReplyTo ?? raw.in_reply_to ?? null,
    patchSet: comment.patchSet,
  });
}

/**
 * Sort by line, file-level comments first. Array.prototype.sort is stable,
 * so comments on the same line keep payload order.
 */
function sortByLine(comments: ReviewComment[]): ReviewComment[] {
  return comments.sort((a, b) => (a.line ?? 0) - (b.line ?? 0));
}

/**
 * Parse raw Gerrit JSON into a Review.
 *
 * Behavior:
 * - Invalid JSON, a stats-only result, or a change without number/subject
 *   → throws MalformedInputError
 * - Comment records without author or message → skipped, reported as
 *   InvalidCommentError through `onInvalidComment`
 * - Files keep the order in which they first appear; comments within a file
 *   are sorted by line with file-level comments first
 *
 * @example
 * ```typescript
 * const review = parseReview(readFileSync('review.json', 'utf-8'));
 * console.log(review.files.map((f) => f.path));
 * ```
 */
export function parseReview(rawJSON: string, options: ParseReviewOptions = {}): Review {
  const onInvalid = options.onInvalidComment ?? ((err) => log.warn(`Skipping ${err.message}`));

  const change = validateChange(extractFirstJsonValue(rawJSON));
  const { valid: comments, members } = collectComments(change, onInvalid);
  const resolution = computeThreadResolution(members);

  const byFile = new Map<string, ReviewComment[]>();
  comments.forEach((comment) => {
    const list = byFile.get(comment.raw.file) ?? [];
    list.push(toReviewComment(comment, resolution[comment.member]));
    byFile.set(comment.raw.file, list);
  });

  const files = [...byFile].map(([path, fileComments]) =>
    Object.freeze({ path, comments: Object.freeze(sortByLine(fileComments)) })
  );

  log.debug(`Found ${comments.length} file comments in ${files.length} files`);

  return Object.freeze({
    changeNumber: change.number,
    subject: change.subject,
    project: change.project ?? 'Unknown',
    files: Object.freeze(files),
  });
}

/**
 * Total number of comments across all files.
 */
export function countComments(review: Review): number {
  return review.files.reduce((total, file) => total + file.comments.length, 0);
}
