import { StructuralQuery } from "./query";

export interface ElementNode {
  readonly tagName: string;
  readonly classNames: readonly string[];
  attr(name: string): string | undefined;
  /** Text content of the element and its descendants, trimmed at both ends. */
  text(): string;
  find(query: StructuralQuery): ElementNode[];
  first(query: StructuralQuery): ElementNode | undefined;
}

/** Read-only view of a parsed page. Results are always in document order. */
export interface DocumentTree {
  find(query: StructuralQuery): ElementNode[];
  first(query: StructuralQuery): ElementNode | undefined;
}
