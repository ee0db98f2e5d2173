import { ExtractedRecord } from "../types";
import { BaseRenderer } from "./baseRenderer";

/**
 * One block per record: `<rank> | <title>` followed by the URL, with a blank
 * line between blocks. Records without a rank print the title alone.
 */
export class LineRenderer extends BaseRenderer {
  render(records: readonly ExtractedRecord[]): string {
    return records.map((record) => this.renderBlock(record)).join("\n");
  }

  private renderBlock(record: ExtractedRecord): string {
    const heading = record.rank === undefined ? record.title : `${record.rank} | ${record.title}`;
    return this.joinLines([heading, record.url]);
  }
}
