import { CheerioAPI, load } from "cheerio";
import { Element } from "domhandler";
import { ParseError } from "../core/errors";
import { StructuralQuery, compileQuery } from "./query";
import { DocumentTree, ElementNode } from "./types";

class CheerioElementNode implements ElementNode {
  constructor(
    private readonly $: CheerioAPI,
    private readonly element: Element,
  ) {}

  get tagName(): string {
    return this.element.tagName.toLowerCase();
  }

  get classNames(): readonly string[] {
    const raw = this.element.attribs.class ?? "";
    return raw.split(/\s+/).filter((name) => name.length > 0);
  }

  attr(name: string): string | undefined {
    return this.element.attribs[name];
  }

  text(): string {
    return this.$(this.element).text().trim();
  }

  find(query: StructuralQuery): ElementNode[] {
    return this.$(this.element)
      .find(compileQuery(query))
      .toArray()
      .map((element) => new CheerioElementNode(this.$, element));
  }

  first(query: StructuralQuery): ElementNode | undefined {
    const [element] = this.$(this.element).find(compileQuery(query)).first().toArray();
    return element ? new CheerioElementNode(this.$, element) : undefined;
  }
}

class CheerioDocumentTree implements DocumentTree {
  constructor(private readonly $: CheerioAPI) {}

  find(query: StructuralQuery): ElementNode[] {
    return this.$.root()
      .find(compileQuery(query))
      .toArray()
      .map((element) => new CheerioElementNode(this.$, element));
  }

  first(query: StructuralQuery): ElementNode | undefined {
    const [element] = this.$.root().find(compileQuery(query)).first().toArray();
    return element ? new CheerioElementNode(this.$, element) : undefined;
  }
}

/**
 * Builds a queryable tree from page HTML. The underlying parser recovers from
 * malformed markup the way browsers do, so the only rejected input is a body
 * with no content at all.
 */
export function parseDocument(html: string): DocumentTree {
  if (html.trim().length === 0) {
    throw new ParseError("cannot parse an empty document");
  }

  try {
    return new CheerioDocumentTree(load(html));
  } catch (error) {
    throw new ParseError(`failed to parse document: ${error instanceof Error ? error.message : String(error)}`, {
      cause: error,
    });
  }
}
