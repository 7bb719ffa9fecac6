export class SetListReadError extends Error {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(`Could not read set list ${path}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'SetListReadError';
    this.path = path;
  }
}

export class PageFetchError extends Error {
  readonly url: string;

  constructor(url: string, cause: unknown) {
    super(`Failed to fetch ${url}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'PageFetchError';
    this.url = url;
  }
}
