import { ExtractedRecord } from "../types";

export type RendererKind = "lines" | "table" | "titles";

export interface Renderer {
  /** Renders the whole result set at once. Output depends only on `records`. */
  render(records: readonly ExtractedRecord[]): string;
}
