export class ScrapeError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type FetchErrorKind = "transport" | "bad_status";

export class FetchError extends ScrapeError {
  readonly kind: FetchErrorKind;
  readonly url: string;
  readonly status?: number;

  private constructor(kind: FetchErrorKind, url: string, message: string, status?: number, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.kind = kind;
    this.url = url;
    this.status = status;
  }

  static transport(url: string, cause: unknown): FetchError {
    const detail = cause instanceof Error ? cause.message : String(cause);
    return new FetchError("transport", url, `request to ${url} failed: ${detail}`, undefined, cause);
  }

  static badStatus(url: string, status: number): FetchError {
    return new FetchError("bad_status", url, `HTTP ${status} while fetching ${url}`, status);
  }
}

export class ParseError extends ScrapeError {}

export type ExtractErrorKind = "missing_rank" | "missing_title" | "missing_href";

/** Raised when an item matched by the item query lacks one of its required fields. */
export class ExtractError extends ScrapeError {
  readonly kind: ExtractErrorKind;
  /** Zero-based position of the item among all matched items. */
  readonly itemIndex: number;

  constructor(kind: ExtractErrorKind, itemIndex: number, detail: string) {
    super(`item ${itemIndex}: ${kind.replace("_", " ")} (${detail})`);
    this.kind = kind;
    this.itemIndex = itemIndex;
  }
}

export class ConfigError extends ScrapeError {}
