import { PgfErrorCode } from "../errors.js";
import { createError, fail, ok } from "../result.js";
import type { PgfResult } from "../result.js";
import type { AbstractSyntax } from "../grammar/types.js";
import { showTree } from "./tree.js";
import type { AbstractSyntaxTree } from "./tree.js";

/**
 * Checks a tree against the abstract syntax and returns its category.
 * With `expected`, the root must also have that category.
 */
export function checkTree(
  abstract: AbstractSyntax,
  tree: AbstractSyntaxTree,
  expected?: string
): PgfResult<string> {
  if (expected !== undefined && !abstract.categories.includes(expected)) {
    return fail(createError(PgfErrorCode.UnknownCategory, `Unknown category "${expected}"`, { category: expected }));
  }

  const signature = abstract.functions.get(tree.fun);
  if (!signature) {
    return fail(createError(PgfErrorCode.UnknownFunction, `Unknown function "${tree.fun}"`, { function: tree.fun }));
  }
  if (expected !== undefined && signature.result !== expected) {
    return fail(
      createError(
        PgfErrorCode.InvalidTree,
        `"${showTree(tree)}" has category ${signature.result} where ${expected} is expected`,
        { expected, actual: signature.result }
      )
    );
  }
  if (tree.args.length !== signature.args.length) {
    return fail(
      createError(
        PgfErrorCode.InvalidTree,
        `"${tree.fun}" takes ${signature.args.length} argument(s) but was given ${tree.args.length}`,
        { function: tree.fun }
      )
    );
  }

  for (const [index, child] of tree.args.entries()) {
    const checked = checkTree(abstract, child, signature.args[index]);
    if (!checked.ok) {
      return checked;
    }
  }
  return ok(signature.result);
}
