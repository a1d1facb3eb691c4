import { PgfDecodeError, PgfErrorCode } from "../errors.js";
import type {
  ConcreteSyntax,
  Flags,
  PgfSymbol,
  PmcfgRule,
  Sequence,
} from "../grammar/types.js";

const MALFORMED = PgfErrorCode.MalformedConcreteSyntax;

/** Field sets are tracked as bitmasks while parsing. */
export const MAX_FIELDS = 16;

export interface RuleRecord {
  /** Byte offset of the rule, for diagnostics. */
  readonly offset: number;
  readonly rule: PmcfgRule;
}

export interface ConcreteTables {
  readonly language: string;
  readonly flags: Flags;
  readonly printNames: ReadonlyMap<string, string>;
  readonly literals: readonly string[];
  readonly sequences: readonly Sequence[];
}

interface CategoryShape {
  readonly fields: number;
  readonly parameters: number;
}

/**
 * Checks the cross-rule invariants that parsing and linearization rely on and
 * builds the lookup indexes. After this succeeds no symbol can reference an
 * argument, field or parameter slot that does not exist.
 */
export function indexConcreteSyntax(
  tables: ConcreteTables,
  records: readonly RuleRecord[]
): ConcreteSyntax {
  const shapes = collectShapes(records);

  const productions = new Map<string, PmcfgRule[]>();
  const rulesByFunction = new Map<string, PmcfgRule[]>();
  for (const record of records) {
    validateRule(record, tables.sequences, shapes);
    appendTo(productions, record.rule.category, record.rule);
    appendTo(rulesByFunction, record.rule.function, record.rule);
  }

  const fieldCounts = new Map<string, number>();
  const parameterCounts = new Map<string, number>();
  for (const [category, shape] of shapes) {
    fieldCounts.set(category, shape.fields);
    parameterCounts.set(category, shape.parameters);
  }

  return {
    ...tables,
    productions,
    rulesByFunction,
    fieldCounts,
    parameterCounts,
  };
}

function collectShapes(records: readonly RuleRecord[]): Map<string, CategoryShape> {
  const shapes = new Map<string, CategoryShape>();
  for (const { offset, rule } of records) {
    const category = rule.category;
    if (rule.fields.length > MAX_FIELDS) {
      throw new PgfDecodeError(
        MALFORMED,
        `Rule for "${rule.function}" has ${rule.fields.length} fields; at most ${MAX_FIELDS} are supported`,
        offset
      );
    }
    const shape = { fields: rule.fields.length, parameters: rule.parameters.length };
    const known = shapes.get(category);
    if (!known) {
      shapes.set(category, shape);
      continue;
    }
    if (known.fields !== shape.fields) {
      throw new PgfDecodeError(
        MALFORMED,
        `Rule for "${rule.function}" has ${shape.fields} field(s) but category "${category}" has ${known.fields}`,
        offset
      );
    }
    if (known.parameters !== shape.parameters) {
      throw new PgfDecodeError(
        MALFORMED,
        `Rule for "${rule.function}" has ${shape.parameters} parameter(s) but category "${category}" has ${known.parameters}`,
        offset
      );
    }
  }
  return shapes;
}

function validateRule(
  record: RuleRecord,
  sequences: readonly Sequence[],
  shapes: ReadonlyMap<string, CategoryShape>
): void {
  const { offset, rule } = record;
  const argumentShape = (argument: number, context: string): CategoryShape => {
    const category = rule.args[argument];
    if (category === undefined) {
      throw new PgfDecodeError(
        MALFORMED,
        `${context} in "${rule.function}" refers to argument ${argument} of ${rule.args.length}`,
        offset
      );
    }
    const shape = shapes.get(category);
    if (!shape) {
      throw new PgfDecodeError(
        MALFORMED,
        `${context} in "${rule.function}" refers to category "${category}", which has no productions`,
        offset
      );
    }
    return shape;
  };

  const checkSymbol = (symbol: PgfSymbol): void => {
    switch (symbol.kind) {
      case "literal":
        return;
      case "argument": {
        const shape = argumentShape(symbol.argument, "Argument projection");
        if (symbol.field >= shape.fields) {
          throw new PgfDecodeError(
            MALFORMED,
            `Argument projection in "${rule.function}" selects field ${symbol.field} of ${shape.fields}`,
            offset
          );
        }
        return;
      }
      case "choice": {
        const shape = argumentShape(symbol.argument, "Parameter choice");
        if (symbol.parameter >= shape.parameters) {
          throw new PgfDecodeError(
            MALFORMED,
            `Parameter choice in "${rule.function}" selects parameter ${symbol.parameter} of ${shape.parameters}`,
            offset
          );
        }
        for (const alternative of symbol.alternatives) {
          alternative.forEach(checkSymbol);
        }
        return;
      }
    }
  };

  for (const index of rule.fields) {
    // Indexes were bounds-checked while the rule was read.
    const sequence = sequences[index] ?? [];
    sequence.forEach(checkSymbol);
  }

  for (const parameter of rule.parameters) {
    if (parameter.kind === "inherit") {
      const shape = argumentShape(parameter.argument, "Inherited parameter");
      if (parameter.slot >= shape.parameters) {
        throw new PgfDecodeError(
          MALFORMED,
          `Inherited parameter in "${rule.function}" reads slot ${parameter.slot} of ${shape.parameters}`,
          offset
        );
      }
    }
  }
}

function appendTo<K, V>(map: Map<K, V[]>, key: K, value: V): void {
  const list = map.get(key);
  if (list) {
    list.push(value);
  } else {
    map.set(key, [value]);
  }
}
