import { ExtractedRecord } from "../types";
import { Renderer } from "./types";

export function renderPlainLines(values: readonly string[]): string {
  return values.map((value) => `${value}\n`).join("");
}

export abstract class BaseRenderer implements Renderer {
  abstract render(records: readonly ExtractedRecord[]): string;

  protected joinLines(lines: readonly string[]): string {
    return renderPlainLines(lines);
  }
}
