export type ScraperErrorCode =
  | "ROBOTS_UNAVAILABLE"
  | "HTTP_NON_RETRIABLE"
  | "HTTP_RETRIABLE"
  | "PARSE_FIELD_MISSING"
  | "JOB_CONFIG_INVALID"
  | "INVALID_TRANSITION";

export class ScraperError extends Error {
  readonly code: ScraperErrorCode;

  constructor(code: ScraperErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** robots.txt could not be loaded; the whole domain is treated as disallowed. */
export class RobotsUnavailableError extends ScraperError {
  constructor(
    readonly domain: string,
    readonly reason: string
  ) {
    super("ROBOTS_UNAVAILABLE", `robots.txt unavailable for ${domain}: ${reason}`);
  }
}

export class HttpNonRetriableError extends ScraperError {
  constructor(
    readonly url: string,
    readonly status: number
  ) {
    super("HTTP_NON_RETRIABLE", `HTTP ${status} for ${url}`);
  }
}

export type RetriableKind = "status" | "timeout" | "network";

export class HttpRetriableError extends ScraperError {
  constructor(
    readonly url: string,
    readonly kind: RetriableKind,
    readonly attempts: number,
    readonly status?: number,
    detail?: string
  ) {
    super(
      "HTTP_RETRIABLE",
      kind === "status"
        ? `HTTP ${status} for ${url} after ${attempts} attempt(s)`
        : `${kind} error for ${url} after ${attempts} attempt(s)${
            detail ? `: ${detail}` : ""
          }`
    );
  }
}

export class ParseFieldMissingError extends ScraperError {
  constructor(
    readonly field: string,
    readonly index: number
  ) {
    super(
      "PARSE_FIELD_MISSING",
      `Listing #${index} is missing required field "${field}"`
    );
  }
}

export class JobConfigInvalidError extends ScraperError {
  constructor(readonly problems: string[]) {
    super("JOB_CONFIG_INVALID", `Invalid site config: ${problems.join("; ")}`);
  }
}

export class InvalidTransitionError extends ScraperError {
  constructor(
    readonly from: string,
    readonly to: string
  ) {
    super("INVALID_TRANSITION", `Cannot move job from ${from} to ${to}`);
  }
}
