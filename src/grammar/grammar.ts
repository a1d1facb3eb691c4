import { PgfErrorCode } from "../errors.js";
import { createError, fail, ok } from "../result.js";
import type { PgfResult } from "../result.js";
import type { Logger } from "../logging/logger.js";
import { linearizeTree } from "../runtime/linearizer.js";
import { parseTokens } from "../runtime/parser.js";
import { whitespaceTokenizer } from "../runtime/tokenize.js";
import type { Tokenizer } from "../runtime/tokenize.js";
import { checkTree } from "../runtime/typeCheck.js";
import { showTree } from "../runtime/tree.js";
import type { AbstractSyntaxTree } from "../runtime/tree.js";
import type {
  AbstractSyntax,
  ConcreteSyntax,
  Flags,
  FunctionSignature,
} from "./types.js";

export interface ParseOptions {
  /** Category to parse as. Defaults to the grammar's start category. */
  readonly startCategory?: string;
  /** Splits the sentence into tokens. Defaults to whitespace splitting. */
  readonly tokenize?: Tokenizer;
  /** Upper bound on the number of trees returned (default 1000). */
  readonly maxTrees?: number;
  readonly logger?: Logger;
}

/**
 * Abstract syntax plus every concrete syntax that decoded successfully.
 * Instances are never mutated after construction.
 */
export class Grammar {
  readonly abstract: AbstractSyntax;
  /** Language identifier → concrete syntax, in declaration order. */
  readonly concretes: ReadonlyMap<string, ConcreteSyntax>;

  constructor(abstract: AbstractSyntax, concretes: ReadonlyMap<string, ConcreteSyntax>) {
    this.abstract = abstract;
    this.concretes = concretes;
  }

  get name(): string {
    return this.abstract.name;
  }

  get startCategory(): string {
    return this.abstract.startCategory;
  }

  get flags(): Flags {
    return this.abstract.flags;
  }

  get categories(): readonly string[] {
    return this.abstract.categories;
  }

  get functions(): ReadonlyMap<string, FunctionSignature> {
    return this.abstract.functions;
  }

  languages(): string[] {
    return [...this.concretes.keys()];
  }

  hasLanguage(language: string): boolean {
    return this.concretes.has(language);
  }

  concrete(language: string): ConcreteSyntax | undefined {
    return this.concretes.get(language);
  }

  /** BCP 47-style code from the concrete `language` flag, e.g. `en-US`. */
  languageCode(language: string): string | undefined {
    const code = this.concretes.get(language)?.flags.get("language");
    return typeof code === "string" ? code.replace(/_/g, "-") : undefined;
  }

  functionType(name: string): FunctionSignature | undefined {
    return this.abstract.functions.get(name);
  }

  functionsByCategory(category: string): string[] {
    const names: string[] = [];
    for (const signature of this.abstract.functions.values()) {
      if (signature.result === category) {
        names.push(signature.name);
      }
    }
    return names;
  }

  parse(
    sentence: string,
    language: string,
    options: ParseOptions = {}
  ): PgfResult<AbstractSyntaxTree[]> {
    const tokenize = options.tokenize ?? whitespaceTokenizer;
    return this.parseTokens(tokenize(sentence), language, options);
  }

  parseTokens(
    tokens: readonly string[],
    language: string,
    options: ParseOptions = {}
  ): PgfResult<AbstractSyntaxTree[]> {
    const concrete = this.concretes.get(language);
    if (!concrete) {
      return fail(unknownLanguage(language));
    }
    const category = options.startCategory ?? this.abstract.startCategory;
    if (!this.abstract.categories.includes(category)) {
      return fail(
        createError(PgfErrorCode.UnknownCategory, `Unknown category "${category}"`, { category })
      );
    }
    const { trees } = parseTokens(concrete, tokens, category, {
      maxTrees: options.maxTrees,
      logger: options.logger,
    });
    return ok(trees);
  }

  linearize(tree: AbstractSyntaxTree, language: string): PgfResult<string> {
    const concrete = this.concretes.get(language);
    if (!concrete) {
      return fail(unknownLanguage(language));
    }
    return linearizeTree(concrete, tree);
  }

  /** Linearizations in every language that can realize the tree. */
  linearizeAll(tree: AbstractSyntaxTree): Map<string, string> {
    const result = new Map<string, string>();
    for (const [language, concrete] of this.concretes) {
      const text = linearizeTree(concrete, tree);
      if (text.ok) {
        result.set(language, text.value);
      }
    }
    return result;
  }

  /**
   * Parses in one language and linearizes every resulting tree in another.
   * Identical outputs from different trees are reported once.
   */
  translate(
    sentence: string,
    from: string,
    to: string,
    options: ParseOptions = {}
  ): PgfResult<string[]> {
    if (!this.concretes.has(to)) {
      return fail(unknownLanguage(to));
    }
    const parsed = this.parse(sentence, from, options);
    if (!parsed.ok) {
      return parsed;
    }
    const outputs = new Set<string>();
    for (const tree of parsed.value) {
      const text = this.linearize(tree, to);
      if (!text.ok) {
        options.logger?.debug("Tree has no linearization in target language", {
          tree: showTree(tree),
          language: to,
        });
        continue;
      }
      outputs.add(text.value);
    }
    return ok([...outputs]);
  }

  /** Type-checks a tree and returns its category. */
  checkTree(tree: AbstractSyntaxTree, category?: string): PgfResult<string> {
    return checkTree(this.abstract, tree, category);
  }
}

function unknownLanguage(language: string) {
  return createError(PgfErrorCode.UnknownLanguage, `Unknown language "${language}"`, { language });
}
