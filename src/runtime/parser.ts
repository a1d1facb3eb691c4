import type { ConcreteSyntax, PgfSymbol, PmcfgRule } from "../grammar/types.js";
import type { Logger } from "../logging/logger.js";
import { silentLogger } from "../logging/logger.js";
import { treeKey } from "./tree.js";
import type { AbstractSyntaxTree } from "./tree.js";

const DEFAULT_MAX_TREES = 1000;

export interface Span {
  /** Index of the first token (inclusive). */
  readonly start: number;
  /** Index after the last token (exclusive). */
  readonly end: number;
}

/** `null` marks a field that is not realized in the input. */
export type FieldSpans = readonly (Span | null)[];

export interface ChartParseOptions {
  readonly maxTrees?: number;
  readonly logger?: Logger;
}

export interface ChartParseResult {
  readonly trees: AbstractSyntaxTree[];
  /** Number of (category, spans, parameters) entries the chart settled on. */
  readonly chartSize: number;
}

interface Derivation {
  readonly rule: PmcfgRule;
  readonly children: readonly string[];
}

interface ChartEntry {
  readonly key: string;
  readonly category: string;
  readonly spans: FieldSpans;
  readonly parameters: readonly number[];
  /** Bitmask of the fields that have a span. */
  readonly placed: number;
  readonly derivations: Map<string, Derivation>;
}

interface Constraint {
  readonly argument: number;
  readonly parameter: number;
  readonly value: number;
}

interface MatchState {
  readonly bindings: readonly (ChartEntry | undefined)[];
  /** Per argument, bitmask of the argument's fields consumed so far. */
  readonly consumed: readonly number[];
  readonly constraints: readonly Constraint[];
  readonly spans: FieldSpans;
}

interface Candidate {
  readonly spans: FieldSpans;
  readonly parameters: readonly number[];
  readonly children: readonly ChartEntry[];
}

/**
 * Bottom-up chart parse of `tokens` as `startCategory`.
 *
 * Entries are keyed by category, the span of every field and the parameter
 * values the derivation carries. Each pass matches every rule against the
 * current chart; the loop stops when a pass adds no entry and no new
 * derivation to an existing entry. All derivations of an entry are kept, so
 * ambiguous input yields every tree. Entries with no placed field stand for
 * subtrees whose text does not appear in the input at all.
 */
export function parseTokens(
  concrete: ConcreteSyntax,
  tokens: readonly string[],
  startCategory: string,
  options: ChartParseOptions = {}
): ChartParseResult {
  const chart = new Chart();
  const rules = [...concrete.productions.values()].flat();
  const matcher = new RuleMatcher(concrete, tokens, chart);

  let passes = 0;
  let changed = true;
  while (changed) {
    changed = false;
    passes += 1;
    for (const rule of rules) {
      for (const candidate of matcher.match(rule)) {
        if (chart.add(rule, candidate)) {
          changed = true;
        }
      }
    }
  }

  const roots = chart
    .entriesOf(startCategory)
    .filter((entry) => coversInput(entry.spans, tokens.length));
  const trees = new TreeExpander(chart, options.maxTrees ?? DEFAULT_MAX_TREES).expandAll(roots);

  (options.logger ?? silentLogger).debug("Chart parse finished", {
    language: concrete.language,
    tokens: tokens.length,
    passes,
    entries: chart.size,
    trees: trees.length,
  });

  return { trees, chartSize: chart.size };
}

function coversInput(spans: FieldSpans, length: number): boolean {
  if (spans.length === 0) {
    return false;
  }
  let position = 0;
  for (const span of spans) {
    if (!span || span.start !== position) {
      return false;
    }
    position = span.end;
  }
  return position === length;
}

function spansOverlap(left: Span, right: Span): boolean {
  return left.start < right.end && right.start < left.end;
}

function entryKey(category: string, spans: FieldSpans, parameters: readonly number[]): string {
  const fields = spans.map((span) => (span ? `${span.start}-${span.end}` : "_")).join(",");
  return `${category}[${fields}]{${parameters.join(",")}}`;
}

class Chart {
  private readonly entries = new Map<string, ChartEntry>();
  private readonly byCategory = new Map<string, ChartEntry[]>();
  private readonly byFieldStart = new Map<string, ChartEntry[]>();
  private readonly unplaced = new Map<string, ChartEntry[]>();

  get size(): number {
    return this.entries.size;
  }

  get(key: string): ChartEntry | undefined {
    return this.entries.get(key);
  }

  entriesOf(category: string): readonly ChartEntry[] {
    return this.byCategory.get(category) ?? [];
  }

  /** Entries of `category` whose field `field` starts at `start`. */
  startingAt(category: string, field: number, start: number): readonly ChartEntry[] {
    return this.byFieldStart.get(fieldStartKey(category, field, start)) ?? [];
  }

  /** Entries of `category` with no field in the input. */
  unplacedOf(category: string): readonly ChartEntry[] {
    return this.unplaced.get(category) ?? [];
  }

  /** Returns true when the candidate adds an entry or a derivation. */
  add(rule: PmcfgRule, candidate: Candidate): boolean {
    const key = entryKey(rule.category, candidate.spans, candidate.parameters);
    const children = candidate.children.map((child) => child.key);
    const derivationKey = `${rule.function}(${children.join(" ")})`;

    const existing = this.entries.get(key);
    if (existing) {
      if (existing.derivations.has(derivationKey)) {
        return false;
      }
      existing.derivations.set(derivationKey, { rule, children });
      return true;
    }

    let placed = 0;
    candidate.spans.forEach((span, field) => {
      if (span) {
        placed |= 1 << field;
      }
    });
    const entry: ChartEntry = {
      key,
      category: rule.category,
      spans: candidate.spans,
      parameters: candidate.parameters,
      placed,
      derivations: new Map([[derivationKey, { rule, children }]]),
    };
    this.entries.set(key, entry);
    pushTo(this.byCategory, rule.category, entry);
    if (placed === 0) {
      pushTo(this.unplaced, rule.category, entry);
    }
    entry.spans.forEach((span, field) => {
      if (span) {
        pushTo(this.byFieldStart, fieldStartKey(rule.category, field, span.start), entry);
      }
    });
    return true;
  }
}

function fieldStartKey(category: string, field: number, start: number): string {
  return `${category}#${field}@${start}`;
}

function pushTo<V>(map: Map<string, V[]>, key: string, value: V): void {
  const list = map.get(key);
  if (list) {
    list.push(value);
  } else {
    map.set(key, [value]);
  }
}

/**
 * Enumerates the ways one rule can be realized over the token sequence given
 * the entries already in the chart. Fields may be left unplaced, which is how
 * a parameter choice erases the table cells it did not select.
 */
class RuleMatcher {
  private readonly concrete: ConcreteSyntax;
  private readonly tokens: readonly string[];
  private readonly chart: Chart;

  constructor(concrete: ConcreteSyntax, tokens: readonly string[], chart: Chart) {
    this.concrete = concrete;
    this.tokens = tokens;
    this.chart = chart;
  }

  match(rule: PmcfgRule): Candidate[] {
    const candidates: Candidate[] = [];
    const fieldCount = rule.fields.length;
    for (let mask = 0; mask < 1 << fieldCount; mask += 1) {
      const initial: MatchState = {
        bindings: rule.args.map(() => undefined),
        consumed: rule.args.map(() => 0),
        constraints: [],
        spans: rule.fields.map(() => null),
      };
      this.matchField(rule, mask, 0, initial, (state) => {
        candidates.push(...this.complete(rule, state));
      });
    }
    return candidates;
  }

  private matchField(
    rule: PmcfgRule,
    mask: number,
    field: number,
    state: MatchState,
    done: (state: MatchState) => void
  ): void {
    if (field === rule.fields.length) {
      done(state);
      return;
    }
    if ((mask & (1 << field)) === 0) {
      this.matchField(rule, mask, field + 1, state, done);
      return;
    }
    const sequence = this.concrete.sequences[rule.fields[field] ?? -1] ?? [];
    for (let start = 0; start <= this.tokens.length; start += 1) {
      this.matchSymbols(rule, sequence, 0, start, state, (end, next) => {
        const spans = next.spans.slice();
        spans[field] = { start, end };
        this.matchField(rule, mask, field + 1, { ...next, spans }, done);
      });
    }
  }

  private matchSymbols(
    rule: PmcfgRule,
    symbols: readonly PgfSymbol[],
    index: number,
    position: number,
    state: MatchState,
    done: (end: number, state: MatchState) => void
  ): void {
    const symbol = symbols[index];
    if (!symbol) {
      done(position, state);
      return;
    }

    switch (symbol.kind) {
      case "literal":
        if (this.tokens[position] === symbol.token) {
          this.matchSymbols(rule, symbols, index + 1, position + 1, state, done);
        }
        return;

      case "argument": {
        const bit = 1 << symbol.field;
        const consumed = state.consumed[symbol.argument] ?? 0;
        if ((consumed & bit) !== 0) {
          // A copied field repeats the tokens of its first occurrence.
          const span = state.bindings[symbol.argument]?.spans[symbol.field];
          if (span && this.repeats(span, position)) {
            const end = position + span.end - span.start;
            this.matchSymbols(rule, symbols, index + 1, end, state, done);
          }
          return;
        }
        const advance = (entry: ChartEntry): void => {
          const span = entry.spans[symbol.field];
          if (!span || span.start !== position) {
            return;
          }
          const bindings = state.bindings.slice();
          bindings[symbol.argument] = entry;
          const nextConsumed = state.consumed.slice();
          nextConsumed[symbol.argument] = consumed | bit;
          this.matchSymbols(rule, symbols, index + 1, span.end, {
            ...state,
            bindings,
            consumed: nextConsumed,
          }, done);
        };
        const bound = state.bindings[symbol.argument];
        if (bound) {
          advance(bound);
          return;
        }
        const category = rule.args[symbol.argument] ?? "";
        for (const entry of this.chart.startingAt(category, symbol.field, position)) {
          advance(entry);
        }
        return;
      }

      case "choice": {
        const rest = symbols.slice(index + 1);
        symbol.alternatives.forEach((alternative, value) => {
          const bound = state.bindings[symbol.argument];
          if (bound && bound.parameters[symbol.parameter] !== value) {
            return;
          }
          const constraint = { argument: symbol.argument, parameter: symbol.parameter, value };
          this.matchSymbols(rule, [...alternative, ...rest], 0, position, {
            ...state,
            constraints: [...state.constraints, constraint],
          }, done);
        });
        return;
      }
    }
  }

  private repeats(span: Span, position: number): boolean {
    const length = span.end - span.start;
    if (position + length > this.tokens.length) {
      return false;
    }
    for (let offset = 0; offset < length; offset += 1) {
      if (this.tokens[position + offset] !== this.tokens[span.start + offset]) {
        return false;
      }
    }
    return true;
  }

  private complete(rule: PmcfgRule, state: MatchState): Candidate[] {
    const placed = state.spans.filter((span): span is Span => span !== null);
    for (let left = 0; left < placed.length; left += 1) {
      for (let right = left + 1; right < placed.length; right += 1) {
        const a = placed[left];
        const b = placed[right];
        if (a && b && spansOverlap(a, b)) {
          return [];
        }
      }
    }

    const options: (readonly ChartEntry[])[] = [];
    for (let argument = 0; argument < rule.args.length; argument += 1) {
      const entry = state.bindings[argument];
      if (!entry) {
        // No placed field reads this argument.
        options.push(this.chart.unplacedOf(rule.args[argument] ?? ""));
        continue;
      }
      // Every placed field of a bound child must be consumed.
      if (entry.placed !== state.consumed[argument]) {
        return [];
      }
      options.push([entry]);
    }

    const candidates: Candidate[] = [];
    for (const children of cartesian(options)) {
      const satisfied = state.constraints.every(
        ({ argument, parameter, value }) => children[argument]?.parameters[parameter] === value
      );
      if (!satisfied) {
        continue;
      }
      const parameters = rule.parameters.map((parameter) =>
        parameter.kind === "constant"
          ? parameter.value
          : children[parameter.argument]?.parameters[parameter.slot] ?? 0
      );
      candidates.push({ spans: state.spans, parameters, children });
    }
    return candidates;
  }
}

function cartesian<T>(options: readonly (readonly T[])[]): T[][] {
  let combinations: T[][] = [[]];
  for (const choices of options) {
    const next: T[][] = [];
    for (const prefix of combinations) {
      for (const choice of choices) {
        next.push([...prefix, choice]);
      }
    }
    combinations = next;
  }
  return combinations;
}

/**
 * Turns chart entries into trees. A derivation that would revisit an entry
 * already on the current path is skipped, so cyclic unit rules yield finitely
 * many trees.
 */
class TreeExpander {
  private readonly chart: Chart;
  private readonly maxTrees: number;

  constructor(chart: Chart, maxTrees: number) {
    this.chart = chart;
    this.maxTrees = Math.max(0, maxTrees);
  }

  expandAll(roots: readonly ChartEntry[]): AbstractSyntaxTree[] {
    const unique = new Map<string, AbstractSyntaxTree>();
    for (const root of roots) {
      for (const tree of this.expand(root.key, new Set())) {
        if (unique.size >= this.maxTrees) {
          return [...unique.values()];
        }
        const key = treeKey(tree);
        if (!unique.has(key)) {
          unique.set(key, tree);
        }
      }
    }
    return [...unique.values()];
  }

  private expand(key: string, path: Set<string>): AbstractSyntaxTree[] {
    const entry = this.chart.get(key);
    if (!entry || path.has(key)) {
      return [];
    }
    path.add(key);
    const trees: AbstractSyntaxTree[] = [];
    for (const { rule, children } of entry.derivations.values()) {
      let combinations: AbstractSyntaxTree[][] = [[]];
      for (const child of children) {
        const options = this.expand(child, path);
        const next: AbstractSyntaxTree[][] = [];
        for (const prefix of combinations) {
          for (const option of options) {
            if (next.length >= this.maxTrees) {
              break;
            }
            next.push([...prefix, option]);
          }
        }
        combinations = next;
      }
      for (const args of combinations) {
        trees.push({ fun: rule.function, args });
      }
      if (trees.length >= this.maxTrees) {
        break;
      }
    }
    path.delete(key);
    return trees;
  }
}
