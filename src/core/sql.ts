import { invalidQuery } from "./errors";
import type { Scalar } from "./row";
import reservedWords from "./reservedWords.json";

/** One piece of a clause: literal SQL text or a symbolic parameter slot. */
export type SqlPart =
  | { readonly kind: "text"; readonly text: string }
  | { readonly kind: "param"; readonly value: Scalar };

/**
 * Clause fragment: an ordered list of text pieces and parameter slots.
 * Fragments compose freely; placeholders are only numbered by `flatten(...)`.
 */
export type Fragment = readonly SqlPart[];

/** Flattened statement: SQL text with `$1..$k` and its parameters. */
export type CompiledQuery = {
  readonly sql: string;
  readonly params: readonly Scalar[];
};

const identifierPattern = /^[A-Za-z_][A-Za-z0-9_]*$/;
const reserved: ReadonlySet<string> = new Set(reservedWords);

export const EMPTY: Fragment = Object.freeze([]);

export function text(value: string): Fragment {
  return [{ kind: "text", text: value }];
}

export function param(value: Scalar): Fragment {
  return [{ kind: "param", value }];
}

/**
 * Build a fragment from text and nested fragments.
 * @example
 * sql("age >= ", param(18)) // age >= $1 once flattened
 */
export function sql(...pieces: (string | Fragment)[]): Fragment {
  const parts: SqlPart[] = [];
  for (const piece of pieces) {
    if (typeof piece === "string") {
      if (piece.length > 0) parts.push({ kind: "text", text: piece });
    } else {
      parts.push(...piece);
    }
  }
  return parts;
}

export function isEmpty(fragment: Fragment): boolean {
  return fragment.length === 0;
}

/** Join non-empty fragments with a separator. */
export function joinFragments(fragments: readonly Fragment[], separator: string): Fragment {
  const parts: SqlPart[] = [];
  let first = true;
  for (const fragment of fragments) {
    if (isEmpty(fragment)) continue;
    if (!first) parts.push({ kind: "text", text: separator });
    parts.push(...fragment);
    first = false;
  }
  return parts;
}

/** Comma-separated parameter slots, e.g. `$1, $2, $3`. */
export function paramList(values: readonly Scalar[]): Fragment {
  return joinFragments(values.map(param), ", ");
}

/**
 * Number every parameter slot in one pass, in textual order.
 * Next: hand the result to `Executor.query(...)`.
 */
export function flatten(fragment: Fragment): CompiledQuery {
  const params: Scalar[] = [];
  let out = "";
  for (const part of fragment) {
    if (part.kind === "text") {
      out += part.text;
      continue;
    }
    params.push(part.value);
    out += `$${params.length}`;
  }
  return Object.freeze({ sql: out, params: Object.freeze(params) });
}

/**
 * Validate an identifier before it is written into SQL text.
 * Ordinary names stay bare; reserved words are double-quoted.
 * @example
 * ident("users") // users
 * ident("order") // "order"
 */
export function ident(name: string): string {
  const checked = checkIdent(name);
  return reserved.has(checked.toLowerCase()) ? `"${checked}"` : checked;
}

/** Validate an identifier that is only ever embedded in a larger name. */
export function checkIdent(name: string): string {
  if (!identifierPattern.test(name)) {
    throw invalidQuery(`unsafe identifier '${name}'`);
  }
  return name;
}

/** `table.column` with both parts validated. */
export function qualified(table: string, column: string): string {
  return `${ident(table)}.${ident(column)}`;
}
