import Parser from "tree-sitter";
import Python from "tree-sitter-python";

/** One import clause as written, before resolution against the importing module. */
export type ImportClause =
  | { kind: "import"; name: string }
  | { kind: "from"; level: number; module: string | null };

export type ParsedImports =
  | { kind: "parsed"; clauses: ImportClause[] }
  | { kind: "failed"; reason: string };

const FUTURE_MODULE = "__future__";
const MIN_BUFFER_SIZE = 32 * 1024;

let sharedParser: Parser | null = null;

function getParser(): Parser {
  if (!sharedParser) {
    const parser = new Parser();
    parser.setLanguage(Python);
    sharedParser = parser;
  }
  return sharedParser;
}

function dottedName(node: Parser.SyntaxNode): string {
  const parts = node.namedChildren.filter((c) => c.type === "identifier").map((c) => c.text);
  return parts.length > 0 ? parts.join(".") : node.text;
}

function importedNames(node: Parser.SyntaxNode): ImportClause[] {
  const clauses: ImportClause[] = [];
  for (const child of node.namedChildren) {
    if (child.type === "dotted_name") {
      clauses.push({ kind: "import", name: dottedName(child) });
    } else if (child.type === "aliased_import") {
      const target = child.childForFieldName("name");
      if (target) clauses.push({ kind: "import", name: dottedName(target) });
    }
  }
  return clauses;
}

function fromClause(node: Parser.SyntaxNode): ImportClause | null {
  const moduleName =
    node.childForFieldName("module_name") ??
    node.namedChildren.find((c) => c.type === "relative_import" || c.type === "dotted_name") ??
    null;
  if (!moduleName) return null;

  if (moduleName.type === "dotted_name") {
    return { kind: "from", level: 0, module: dottedName(moduleName) };
  }

  let level = 0;
  let module: string | null = null;
  for (const child of moduleName.namedChildren) {
    if (child.type === "import_prefix") {
      level = (child.text.match(/\./g) ?? []).length;
    } else if (child.type === "dotted_name") {
      module = dottedName(child);
    }
  }
  return { kind: "from", level, module };
}

/** Pre-order walk over the whole tree, so imports nested in functions and blocks count too. */
function collectClauses(root: Parser.SyntaxNode): ImportClause[] {
  const clauses: ImportClause[] = [];
  const stack: Parser.SyntaxNode[] = [root];

  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;

    if (node.type === "import_statement") {
      clauses.push(...importedNames(node));
      continue;
    }
    if (node.type === "import_from_statement") {
      const clause = fromClause(node);
      if (clause) clauses.push(clause);
      continue;
    }
    if (node.type === "future_import_statement") {
      clauses.push({ kind: "from", level: 0, module: FUTURE_MODULE });
      continue;
    }

    const children = node.namedChildren;
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push(children[i]);
    }
  }

  return clauses;
}

/** Python 2 forms the grammar still accepts but Python 3 rejects. */
const LEGACY_NODES = new Map<string, string>([
  ["print_statement", "print statement"],
  ["exec_statement", "exec statement"],
  ["<>", "<> operator"],
]);

function firstErrorLine(root: Parser.SyntaxNode): number {
  let node = root;
  for (;;) {
    const broken = node.children.find((c) => c.hasError);
    if (!broken) return node.startPosition.row + 1;
    node = broken;
  }
}

function findLegacySyntax(root: Parser.SyntaxNode): string | null {
  const stack: Parser.SyntaxNode[] = [root];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    const legacy = LEGACY_NODES.get(node.type);
    if (legacy) return `${legacy} near line ${node.startPosition.row + 1}`;
    const children = node.children;
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push(children[i]);
    }
  }
  return null;
}

/**
 * Import clauses of a Python module, in source order.
 * Source that does not parse cleanly as Python 3 is reported as failed; no partial
 * clause list is returned. Errors from the parser binding are failures too.
 */
export function parsePythonImports(source: string): ParsedImports {
  try {
    const tree = getParser().parse(source, undefined, {
      bufferSize: Math.max(MIN_BUFFER_SIZE, source.length * 2 + 1),
    });
    const root = tree.rootNode;
    if (root.hasError) {
      return { kind: "failed", reason: `syntax error near line ${firstErrorLine(root)}` };
    }
    const legacy = findLegacySyntax(root);
    if (legacy) {
      return { kind: "failed", reason: `Python 2 syntax: ${legacy}` };
    }
    return { kind: "parsed", clauses: collectClauses(root) };
  } catch (err) {
    return { kind: "failed", reason: err instanceof Error ? err.message : String(err) };
  }
}
