/**
 * @description: Ensures request bodies decode into drafts and malformed ones are rejected with the right error class.
 * @scope: test
 * @module: PostDraftValidationTests
 * @risk: low - Tests only validate decoding helpers.
 */
import test from 'node:test';
import assert from 'node:assert/strict';

import { RequestBodyError, RequestValidationError } from '../src/shared/errors';
import { parsePostDraft } from '../src/validation/postDraft';

const expectMissingFields = (body: string, fields: string[]) => {
  assert.throws(
    () => parsePostDraft(body),
    (error: unknown) => {
      assert.ok(error instanceof RequestValidationError);
      assert.deepEqual(error.fields, fields);
      assert.equal(error.message, 'title and content are required');
      return true;
    }
  );
};

test('parsePostDraft reads every draft field', () => {
  const draft = parsePostDraft('{"title":"T","content":"C","category":"K","tags":["a","b"]}');
  assert.deepEqual(draft, { title: 'T', content: 'C', category: 'K', tags: ['a', 'b'] });
});

test('parsePostDraft defaults optional fields', () => {
  assert.deepEqual(parsePostDraft('{"title":"T","content":"C"}'), { title: 'T', content: 'C', category: '', tags: [] });
  assert.deepEqual(
    parsePostDraft('{"title":"T","content":"C","category":null,"tags":null}'),
    { title: 'T', content: 'C', category: '', tags: [] }
  );
});

// Server-owned fields in the body are dropped rather than trusted.
test('parsePostDraft ignores ids, timestamps and unknown fields', () => {
  const draft = parsePostDraft(
    '{"id":99,"title":"T","content":"C","createdAt":"2020-01-01T00:00:00Z","updatedAt":"x","extra":true}'
  );
  assert.deepEqual(draft, { title: 'T', content: 'C', category: '', tags: [] });
});

test('parsePostDraft keeps whitespace-only text as non-empty', () => {
  assert.equal(parsePostDraft('{"title":" ","content":"C"}').title, ' ');
});

test('parsePostDraft reports which required fields are empty', () => {
  expectMissingFields('{"content":"C"}', ['title']);
  expectMissingFields('{"title":"T","content":""}', ['content']);
  expectMissingFields('{"title":"","content":""}', ['title', 'content']);
  expectMissingFields('{}', ['title', 'content']);
  expectMissingFields('null', ['title', 'content']);
});

test('parsePostDraft rejects bodies that are not post-shaped objects', () => {
  const malformed = [
    '',
    '   ',
    '{',
    '[]',
    '"text"',
    '42',
    '{"title":5,"content":"C"}',
    '{"title":"T","content":"C","category":["x"]}',
    '{"title":"T","content":"C","tags":"x"}',
    '{"title":"T","content":"C","tags":[1]}'
  ];

  for (const body of malformed) {
    assert.throws(() => parsePostDraft(body), RequestBodyError, `expected ${JSON.stringify(body)} to be rejected`);
  }
});
