import { DocumentTree, byAttr, byTag, and } from "../crawl";

/** Every anchor target on the page in document order. Anchors without an `href` attribute are ignored. */
export function collectLinks(tree: DocumentTree): string[] {
  const links: string[] = [];
  for (const anchor of tree.find(and(byTag("a"), byAttr("href")))) {
    const href = anchor.attr("href");
    if (href !== undefined) {
      links.push(href);
    }
  }
  return links;
}
