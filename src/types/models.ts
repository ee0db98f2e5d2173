/** One story as it appears on the page. `title` and `url` are never empty. */
export interface ExtractedRecord {
  rank?: string;
  title: string;
  url: string;
}
