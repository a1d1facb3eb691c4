import { PgfError, PgfErrorCode } from "../errors.js";

export interface AbstractSyntaxTree {
  /** Abstract function applied at this node. */
  readonly fun: string;
  /** Children in argument order. */
  readonly args: readonly AbstractSyntaxTree[];
}

export function mkTree(fun: string, ...args: AbstractSyntaxTree[]): AbstractSyntaxTree {
  return { fun, args };
}

/**
 * Prints a tree in prefix notation, e.g. `Pred (This Pizza) Delicious`.
 * The printed form is canonical, so it doubles as the tree's structural key.
 */
export function showTree(tree: AbstractSyntaxTree): string {
  return [tree.fun, ...tree.args.map(showArgument)].join(" ");
}

function showArgument(tree: AbstractSyntaxTree): string {
  return tree.args.length === 0 ? tree.fun : `(${showTree(tree)})`;
}

export const treeKey = showTree;

export function treesEqual(left: AbstractSyntaxTree, right: AbstractSyntaxTree): boolean {
  if (left === right) {
    return true;
  }
  if (left.fun !== right.fun || left.args.length !== right.args.length) {
    return false;
  }
  return left.args.every((arg, index) => {
    const other = right.args[index];
    return other !== undefined && treesEqual(arg, other);
  });
}

/** Removes structural duplicates, keeping the first occurrence of each tree. */
export function uniqueTrees(trees: Iterable<AbstractSyntaxTree>): AbstractSyntaxTree[] {
  const seen = new Map<string, AbstractSyntaxTree>();
  for (const tree of trees) {
    const key = treeKey(tree);
    if (!seen.has(key)) {
      seen.set(key, tree);
    }
  }
  return [...seen.values()];
}

const TREE_TOKEN = /\(|\)|[^\s()]+/g;

/** Reads the notation produced by {@link showTree}. */
export function readTree(text: string): AbstractSyntaxTree {
  const tokens = text.match(TREE_TOKEN) ?? [];
  let position = 0;

  const invalid = (message: string): PgfError =>
    new PgfError(PgfErrorCode.InvalidTree, `${message} in "${text.trim()}"`);

  const readApplication = (): AbstractSyntaxTree => {
    const head = tokens[position];
    if (head === undefined) {
      throw invalid("Expected a function name");
    }
    if (head === "(") {
      const inner = readAtom();
      if (inner.args.length > 0 && startsArgument(tokens[position])) {
        throw invalid("A parenthesized application cannot take further arguments");
      }
      return inner;
    }
    if (head === ")") {
      throw invalid("Unexpected ')'");
    }
    position += 1;
    const args: AbstractSyntaxTree[] = [];
    while (startsArgument(tokens[position])) {
      args.push(readAtom());
    }
    return { fun: head, args };
  };

  const readAtom = (): AbstractSyntaxTree => {
    const token = tokens[position];
    if (token === "(") {
      position += 1;
      const inner = readApplication();
      if (tokens[position] !== ")") {
        throw invalid("Expected ')'");
      }
      position += 1;
      return inner;
    }
    if (token === undefined || token === ")") {
      throw invalid("Expected an argument");
    }
    position += 1;
    return { fun: token, args: [] };
  };

  const tree = readApplication();
  if (position < tokens.length) {
    throw invalid(`Unexpected "${tokens[position] ?? ""}"`);
  }
  return tree;
}

function startsArgument(token: string | undefined): boolean {
  return token !== undefined && token !== ")";
}
