import test from 'node:test';
import assert from 'node:assert/strict';

import { IndexingError, NotFoundError } from '../errors.js';
import { describeError, getErrorCode, getErrorMessage, safeGetProperty } from '../utils/error-utils.js';

test('describeError follows the cause chain', () => {
  const error = new IndexingError('store', 'failed to store chunks for project api', new Error('disk full'));

  assert.equal(describeError(error), 'failed to store chunks for project api: disk full');
  assert.equal(describeError('plain'), 'plain');
});

test('error fields are read from unknown values', () => {
  const notFound = new NotFoundError('project', 'api');

  assert.equal(getErrorMessage(notFound), 'project not found: api');
  assert.equal(getErrorCode(notFound), 'NOT_FOUND');
  assert.equal(getErrorCode(new Error('x')), undefined);
  assert.equal(getErrorMessage(42), '42');
  assert.equal(safeGetProperty({ default: 'grammar' }, 'default'), 'grammar');
  assert.equal(safeGetProperty(null, 'default'), undefined);
});
