import { LineRenderer } from "./lineRenderer";
import { TableRenderer } from "./tableRenderer";
import { TitleRenderer } from "./titleRenderer";
import { Renderer, RendererKind } from "./types";

export interface RendererOptions {
  color: boolean;
}

export function createRenderer(kind: RendererKind, options: RendererOptions): Renderer {
  switch (kind) {
    case "lines":
      return new LineRenderer();
    case "table":
      return new TableRenderer({ color: options.color });
    case "titles":
      return new TitleRenderer();
    default:
      throw new Error(`Unsupported renderer: ${String(kind)}`);
  }
}

export { renderPlainLines } from "./baseRenderer";
export { LineRenderer, TableRenderer, TitleRenderer };
export type { ColorLevel, TableRendererOptions } from "./tableRenderer";
export * from "./types";
