import type { SyntaxNode } from 'tree-sitter';

const DIRECTIVE_PATTERN = /^(?:line |extern |export |[a-z0-9]+:[a-z0-9])/;

/**
 * Comment nodes forming the doc block of `node`: consecutive comments with
 * no blank line between them, the last one ending on the line directly
 * above the declaration. A comment that trails code on its own line is not
 * part of the block.
 */
export function collectDocComments(node: SyntaxNode): SyntaxNode[] {
  const block: SyntaxNode[] = [];
  let expectedEndRow = node.startPosition.row - 1;
  let current = node.previousNamedSibling;

  while (current && current.type === 'comment' && current.endPosition.row === expectedEndRow) {
    const before = current.previousNamedSibling;
    if (before && before.type !== 'comment' && before.endPosition.row === current.startPosition.row) {
      break;
    }
    block.unshift(current);
    expectedEndRow = current.startPosition.row - 1;
    current = before;
  }

  return block;
}

function commentLines(raw: string): string[] {
  if (raw.startsWith('//')) {
    let body = raw.slice(2);
    if (DIRECTIVE_PATTERN.test(body)) {
      return [];
    }
    if (body.startsWith(' ')) {
      body = body.slice(1);
    }
    return [body];
  }

  if (raw.startsWith('/*')) {
    return raw.slice(2, raw.endsWith('*/') ? -2 : undefined).split('\n');
  }

  return raw.split('\n');
}

/**
 * Doc text of a comment block: markers removed, trailing whitespace
 * trimmed, leading and trailing blank lines dropped, runs of blank lines
 * collapsed, newline-terminated. Empty when there is nothing left.
 */
export function formatDocText(comments: readonly string[]): string {
  const lines = comments
    .flatMap(commentLines)
    .map((line) => line.replace(/\s+$/, ''));

  const kept: string[] = [];
  for (const line of lines) {
    if (line !== '' || (kept.length > 0 && kept[kept.length - 1] !== '')) {
      kept.push(line);
    }
  }

  while (kept.length > 0 && kept[kept.length - 1] === '') {
    kept.pop();
  }

  return kept.length > 0 ? `${kept.join('\n')}\n` : '';
}

export function extractDocString(node: SyntaxNode): string {
  return formatDocText(collectDocComments(node).map((comment) => comment.text));
}
