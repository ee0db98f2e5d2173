/**
 * Structural predicates over a parsed document.
 *
 * Queries are plain values so extraction profiles can be declared as data and
 * evaluated by any `DocumentTree` implementation. `compileQuery` turns them
 * into the CSS selector the cheerio-backed tree runs.
 */

export type SimpleQuery =
  | { kind: "tag"; name: string }
  | { kind: "class"; name: string }
  | { kind: "attr"; name: string; value?: string }
  | { kind: "and"; parts: SimpleQuery[] }
  | { kind: "nth_child"; query: SimpleQuery; position: number };

export type StructuralQuery =
  | SimpleQuery
  | { kind: "descendant"; ancestor: StructuralQuery; query: SimpleQuery }
  | { kind: "child"; parent: StructuralQuery; query: SimpleQuery };

const IDENTIFIER = /^-?[A-Za-z_][\w-]*$/;

function assertIdentifier(kind: string, name: string): string {
  if (!IDENTIFIER.test(name)) {
    throw new Error(`Invalid ${kind} name in structural query: ${JSON.stringify(name)}`);
  }
  return name;
}

export function byTag(name: string): SimpleQuery {
  return { kind: "tag", name: assertIdentifier("tag", name).toLowerCase() };
}

export function byClass(name: string): SimpleQuery {
  return { kind: "class", name: assertIdentifier("class", name) };
}

export function byAttr(name: string, value?: string): SimpleQuery {
  return { kind: "attr", name: assertIdentifier("attribute", name), value };
}

export function and(...parts: SimpleQuery[]): SimpleQuery {
  if (parts.length === 0) {
    throw new Error("and() needs at least one query");
  }
  return { kind: "and", parts };
}

/** Matches elements satisfying `query` that are the `position`-th child (1-based) of their parent. */
export function nthChild(query: SimpleQuery, position: number): SimpleQuery {
  if (!Number.isInteger(position) || position < 1) {
    throw new Error(`nthChild position must be a positive integer, got ${position}`);
  }
  return { kind: "nth_child", query, position };
}

export function descendant(ancestor: StructuralQuery, query: SimpleQuery): StructuralQuery {
  return { kind: "descendant", ancestor, query };
}

export function child(parent: StructuralQuery, query: SimpleQuery): StructuralQuery {
  return { kind: "child", parent, query };
}

interface CompoundSelector {
  tags: string[];
  filters: string[];
  positions: string[];
}

function quoteCssString(value: string): string {
  const escaped = value
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\r\n|\r|\n|\f/g, "\\a ");
  return `"${escaped}"`;
}

// A type selector must lead a compound selector and pseudo-classes close it,
// whatever order the parts were combined in.
function collectCompound(query: SimpleQuery, into: CompoundSelector): CompoundSelector {
  switch (query.kind) {
    case "tag":
      into.tags.push(query.name);
      break;
    case "class":
      into.filters.push(`.${query.name}`);
      break;
    case "attr":
      into.filters.push(query.value === undefined ? `[${query.name}]` : `[${query.name}=${quoteCssString(query.value)}]`);
      break;
    case "and":
      for (const part of query.parts) {
        collectCompound(part, into);
      }
      break;
    case "nth_child":
      collectCompound(query.query, into);
      into.positions.push(`:nth-child(${query.position})`);
      break;
  }
  return into;
}

function compileSimple(query: SimpleQuery): string {
  const { tags, filters, positions } = collectCompound(query, { tags: [], filters: [], positions: [] });
  if (tags.length > 1) {
    throw new Error("and() cannot combine more than one tag query");
  }
  return [...tags, ...filters, ...positions].join("");
}

export function compileQuery(query: StructuralQuery): string {
  switch (query.kind) {
    case "descendant":
      return `${compileQuery(query.ancestor)} ${compileSimple(query.query)}`;
    case "child":
      return `${compileQuery(query.parent)} > ${compileSimple(query.query)}`;
    default:
      return compileSimple(query);
  }
}

export const describeQuery = compileQuery;
