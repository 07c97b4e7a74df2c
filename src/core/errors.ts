/** Base class for failures the crawler surfaces to its caller */
export class CrawlerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Invalid source list: bad YAML, unknown fields, malformed selectors.
 * Raised before any network activity.
 */
export class ConfigurationError extends CrawlerError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length ? `${message}\n   - ${issues.join("\n   - ")}` : message);
    this.issues = issues;
  }
}

/** The first listing page of a source could not be fetched */
export class SourceError extends CrawlerError {
  readonly source: string;
  readonly url: string;

  constructor(source: string, url: string, cause: string) {
    super(`Source "${source}" unreachable at ${url}: ${cause}`);
    this.source = source;
    this.url = url;
  }
}
