import { ExtractedRecord } from "../types";
import { BaseRenderer } from "./baseRenderer";

export class TitleRenderer extends BaseRenderer {
  render(records: readonly ExtractedRecord[]): string {
    return this.joinLines(records.map((record) => record.title));
  }
}
