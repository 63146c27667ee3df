/**
 * @description: Decodes create/update request bodies into post drafts.
 * @scope: backend
 * @module: PostDraftValidation
 * @risk: medium - Loose decoding lets malformed posts into the store.
 */
import type { PostDraft } from '../models/post';
import { RequestBodyError, RequestValidationError } from '../shared/errors';

// --- Field readers ---
// Absent and null both mean "not supplied"; any other non-string is a malformed body.
const readTextField = (record: Record<string, unknown>, field: string): string => {
  const value = record[field];
  if (value === undefined || value === null) {
    return '';
  }
  if (typeof value !== 'string') {
    throw new RequestBodyError();
  }
  return value;
};

const readTagsField = (record: Record<string, unknown>): string[] => {
  const value = record.tags;
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new RequestBodyError();
  }

  const tags: string[] = [];
  for (const tag of value) {
    if (typeof tag !== 'string') {
      throw new RequestBodyError();
    }
    tags.push(tag);
  }
  return tags;
};

const assertRequiredFields = (draft: PostDraft): void => {
  const missing: string[] = [];
  if (draft.title === '') {
    missing.push('title');
  }
  if (draft.content === '') {
    missing.push('content');
  }
  if (missing.length > 0) {
    throw new RequestValidationError(missing);
  }
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Parses a raw JSON body into a draft. Throws `RequestBodyError` when the body
 * is not a post-shaped object and `RequestValidationError` when title or
 * content is empty. Unknown fields, and any id or timestamps, are ignored.
 */
export function parsePostDraft(body: string): PostDraft {
  if (body.trim().length === 0) {
    throw new RequestBodyError();
  }

  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch {
    throw new RequestBodyError();
  }

  // A literal null decodes to an empty draft and then fails validation below.
  if (payload !== null && !isRecord(payload)) {
    throw new RequestBodyError();
  }
  const record: Record<string, unknown> = isRecord(payload) ? payload : {};

  const draft: PostDraft = {
    title: readTextField(record, 'title'),
    content: readTextField(record, 'content'),
    category: readTextField(record, 'category'),
    tags: readTagsField(record)
  };

  assertRequiredFields(draft);
  return draft;
}
