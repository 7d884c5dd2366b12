import { setImmediate } from "node:timers/promises";
import { SQLDialect } from "@codemirror/lang-sql";
import { TreeFragment, type Parser, type SyntaxNode, type Tree } from "@lezer/common";
import dialectWords from "./data/cql-dialect.json";
import { InternalParseFailureError, describeError } from "./errors";
import type { OffsetEdit } from "./text-buffer";

// Re-export types for use in other modules
export type { Tree, SyntaxNode };

/**
 * CQL flavour of the lezer SQL grammar shipped with `@codemirror/lang-sql`.
 *
 * CQL accepts `//` line comments next to `--` and `/* *\/`, and `$$`-quoted
 * function bodies. Double quotes delimit identifiers, not strings.
 */
export const CQLDialect = SQLDialect.define({
  keywords: dialectWords.keywords.join(" "),
  types: dialectWords.types.join(" "),
  builtin: dialectWords.builtins.join(" "),
  slashComments: true,
  doubleDollarQuotedStrings: true,
});

/**
 * What the document store needs from a parser.
 */
export interface SyntaxParser {
  /** Parse `text` from scratch. */
  parse(text: string): Tree;
  /**
   * Produce the tree for `text`, reusing the unaffected parts of `previous`.
   * `edits` are the offset edits that turned the previous text into `text`,
   * in application order.
   */
  reparse(previous: Tree | null, edits: readonly OffsetEdit[], text: string): Tree;
  /**
   * Same result as `reparse`, computed in slices of at most `sliceMs`
   * milliseconds with a turn of the event loop between slices.
   */
  reparseInSlices(
    previous: Tree | null,
    edits: readonly OffsetEdit[],
    text: string,
    sliceMs: number
  ): Promise<Tree>;
}

/**
 * Incremental parser adapter over a lezer parser.
 *
 * The previous tree is cut into fragments which are shifted through every
 * edit in turn, so each edit is interpreted against the text produced by its
 * predecessors. Lezer only reuses fragments that are untouched by the edits,
 * which keeps the result identical to a full parse.
 */
export class IncrementalParser implements SyntaxParser {
  constructor(private readonly parser: Parser = CQLDialect.language.parser) {}

  parse(text: string): Tree {
    return this.run(text, []);
  }

  reparse(previous: Tree | null, edits: readonly OffsetEdit[], text: string): Tree {
    return this.run(text, fragmentsFor(previous, edits));
  }

  async reparseInSlices(
    previous: Tree | null,
    edits: readonly OffsetEdit[],
    text: string,
    sliceMs: number
  ): Promise<Tree> {
    const partial = this.guard(() => this.parser.startParse(text, fragmentsFor(previous, edits)));
    let deadline = performance.now() + sliceMs;
    for (;;) {
      const tree = this.guard(() => partial.advance());
      if (tree) {
        return checkLength(tree, text);
      }
      if (performance.now() >= deadline) {
        await setImmediate();
        deadline = performance.now() + sliceMs;
      }
    }
  }

  private run(text: string, fragments: readonly TreeFragment[]): Tree {
    return checkLength(
      this.guard(() => this.parser.parse(text, fragments)),
      text
    );
  }

  private guard<T>(step: () => T): T {
    try {
      return step();
    } catch (error) {
      throw new InternalParseFailureError(`Parser threw: ${describeError(error)}`, { cause: error });
    }
  }
}

function fragmentsFor(previous: Tree | null, edits: readonly OffsetEdit[]): readonly TreeFragment[] {
  if (!previous) {
    return [];
  }
  let fragments = TreeFragment.addTree(previous);
  for (const edit of edits) {
    fragments = TreeFragment.applyChanges(fragments, [
      {
        fromA: edit.from,
        toA: edit.to,
        fromB: edit.from,
        toB: edit.from + edit.insert.length,
      },
    ]);
  }
  return fragments;
}

function checkLength(tree: Tree, text: string): Tree {
  if (tree.length !== text.length) {
    throw new InternalParseFailureError(
      `Parser produced a tree of length ${tree.length} for text of length ${text.length}`
    );
  }
  return tree;
}

/**
 * Structural equality over named nodes: same types, same spans, same order.
 *
 * Anonymous nodes are skipped because lezer may balance repetitions
 * differently when it reuses fragments.
 */
export function treesEquivalent(a: Tree, b: Tree): boolean {
  if (a.length !== b.length) {
    return false;
  }
  const left = a.cursor();
  const right = b.cursor();
  for (;;) {
    if (left.type.id !== right.type.id || left.from !== right.from || left.to !== right.to) {
      return false;
    }
    const leftMoved = left.next();
    const rightMoved = right.next();
    if (leftMoved !== rightMoved) {
      return false;
    }
    if (!leftMoved) {
      return true;
    }
  }
}

let defaultParser: IncrementalParser | null = null;

/**
 * Shared parser instance. Lezer parsers are stateless, so one is enough.
 */
export function getParser(): IncrementalParser {
  if (!defaultParser) {
    defaultParser = new IncrementalParser();
  }
  return defaultParser;
}

/**
 * Parse a CQL document and return the syntax tree.
 */
export function parseDocument(text: string): Tree {
  return getParser().parse(text);
}
