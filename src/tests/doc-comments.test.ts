import test from 'node:test';
import assert from 'node:assert/strict';

import { formatDocText } from '../symbols/doc-comments.js';

test('strips line comment markers and one leading space', () => {
  assert.equal(formatDocText(['// Run starts.', '//   indented']), 'Run starts.\n  indented\n');
});

test('collapses blank runs and trims blank edges', () => {
  assert.equal(formatDocText(['//', '// First.', '//', '//', '// Second.', '//']), 'First.\n\nSecond.\n');
});

test('drops directive lines', () => {
  assert.equal(
    formatDocText(['// Encode writes the value.', '//go:generate stringer -type=Kind', '//line main.go:10']),
    'Encode writes the value.\n'
  );
});

test('unwraps block comments', () => {
  assert.equal(formatDocText(['/*\nPackage docs.\n*/']), 'Package docs.\n');
});

test('empty input yields an empty string', () => {
  assert.equal(formatDocText([]), '');
  assert.equal(formatDocText(['//']), '');
});
