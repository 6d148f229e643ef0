import type { SyntaxNode } from 'tree-sitter';

interface DeclarationBase {
  name: string;
  /** Node whose text becomes the chunk code. */
  node: SyntaxNode;
  /** Node whose rows give the chunk line range. */
  span: SyntaxNode;
  /** Node the doc comment block sits above. */
  docAnchor: SyntaxNode;
}

export interface FunctionDeclaration extends DeclarationBase {
  kind: 'function';
  body: SyntaxNode | null;
}

export interface MethodDeclaration extends DeclarationBase {
  kind: 'method';
  receiver: string;
  body: SyntaxNode | null;
}

export interface StructDeclaration extends DeclarationBase {
  kind: 'struct';
}

export interface InterfaceDeclaration extends DeclarationBase {
  kind: 'interface';
}

export type Declaration =
  | FunctionDeclaration
  | MethodDeclaration
  | StructDeclaration
  | InterfaceDeclaration;

export type DeclarationVisitor<R> = {
  [K in Declaration['kind']]: (declaration: Extract<Declaration, { kind: K }>) => R;
};

export function visitDeclaration<R>(declaration: Declaration, visitor: DeclarationVisitor<R>): R {
  switch (declaration.kind) {
    case 'function':
      return visitor.function(declaration);
    case 'method':
      return visitor.method(declaration);
    case 'struct':
      return visitor.struct(declaration);
    case 'interface':
      return visitor.interface(declaration);
  }
}

/** Type text of the first receiver parameter, or null when the list is empty. */
function receiverType(node: SyntaxNode): string | null {
  const receiver = node.childForFieldName('receiver');
  const first = receiver?.namedChildren.find((child) => child.type === 'parameter_declaration');
  const type = first?.childForFieldName('type');
  return type ? type.text : null;
}

function fromFunctionLike(node: SyntaxNode): Declaration | null {
  const name = node.childForFieldName('name');
  if (!name) {
    return null;
  }

  const base = { name: name.text, node, span: node, docAnchor: node, body: node.childForFieldName('body') };
  const receiver = node.type === 'method_declaration' ? receiverType(node) : null;

  return receiver === null
    ? { kind: 'function', ...base }
    : { kind: 'method', receiver, ...base };
}

function fromTypeDeclaration(node: SyntaxNode): Declaration[] {
  const declarations: Declaration[] = [];

  for (const spec of node.namedChildren) {
    if (spec.type !== 'type_spec') {
      continue;
    }

    const name = spec.childForFieldName('name');
    const type = spec.childForFieldName('type');
    if (!name || !type) {
      continue;
    }

    const base = { name: name.text, node, span: spec, docAnchor: node };
    if (type.type === 'struct_type') {
      declarations.push({ kind: 'struct', ...base });
    } else if (type.type === 'interface_type') {
      declarations.push({ kind: 'interface', ...base });
    }
  }

  return declarations;
}

/**
 * Top-level declarations of a source file in tree order. Nested
 * declarations (types inside function bodies) are not visited.
 */
export function collectDeclarations(root: SyntaxNode, declarationTypes: readonly string[]): Declaration[] {
  const declarations: Declaration[] = [];

  for (const child of root.namedChildren) {
    if (!declarationTypes.includes(child.type)) {
      continue;
    }

    switch (child.type) {
      case 'function_declaration':
      case 'method_declaration': {
        const declaration = fromFunctionLike(child);
        if (declaration) {
          declarations.push(declaration);
        }
        break;
      }
      case 'type_declaration':
        declarations.push(...fromTypeDeclaration(child));
        break;
      default:
        break;
    }
  }

  return declarations;
}
