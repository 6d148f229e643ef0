import type { SyntaxNode } from 'tree-sitter';

/** Selector names treated as inbound route registrations. */
export const ENDPOINT_METHODS = new Set([
  'GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'HEAD', 'OPTIONS',
  'Get', 'Post', 'Put', 'Delete', 'Patch', 'Head', 'Options'
]);

/** Selector names treated as outbound client requests. */
export const CALL_METHODS = new Set(['Get', 'Post', 'Put', 'Delete', 'Patch']);

const STRING_LITERAL_TYPES = new Set(['interpreted_string_literal', 'raw_string_literal']);

export interface HttpUsage {
  endpoints: string[];
  calls: string[];
}

interface VerbCall {
  method: string;
  value: string;
}

function trimDoubleQuotes(literal: string): string {
  return literal.replace(/^"+|"+$/g, '');
}

/**
 * `x.Method("literal", ...)` calls anywhere under `node`, in pre-order.
 * Only calls through a selector with a string-literal first argument count.
 */
function collectVerbCalls(node: SyntaxNode, out: VerbCall[]): void {
  if (node.type === 'call_expression') {
    const fn = node.childForFieldName('function');
    const args = node.childForFieldName('arguments');
    const selector = fn?.type === 'selector_expression' ? fn.childForFieldName('field') : null;
    const first = args?.namedChildren.find((child) => child.type !== 'comment');

    if (selector && first && STRING_LITERAL_TYPES.has(first.type)) {
      out.push({ method: selector.text, value: trimDoubleQuotes(first.text) });
    }
  }

  for (const child of node.namedChildren) {
    collectVerbCalls(child, out);
  }
}

/**
 * Classifies verb-named calls in a function body. A title-case `Get` with a
 * string argument matches both lists; the heuristic is syntactic only.
 */
export function detectHttpUsage(body: SyntaxNode | null): HttpUsage {
  if (!body) {
    return { endpoints: [], calls: [] };
  }

  const verbCalls: VerbCall[] = [];
  collectVerbCalls(body, verbCalls);

  return {
    endpoints: verbCalls
      .filter((call) => ENDPOINT_METHODS.has(call.method))
      .map((call) => `${call.method} ${call.value}`),
    calls: verbCalls
      .filter((call) => CALL_METHODS.has(call.method))
      .map((call) => `${call.method} ${call.value}`)
  };
}
