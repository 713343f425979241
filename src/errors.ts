export class InvalidUrlError extends Error {
  constructor(public readonly url: string) {
    super(`Not a ps32 municipality list URL (CZ language): ${url}`);
    this.name = 'InvalidUrlError';
  }
}

export class NoMunicipalitiesError extends Error {
  constructor(public readonly url: string) {
    super(
      `No municipalities found on ${url}. The link must point to a ps32 page listing municipalities.`
    );
    this.name = 'NoMunicipalitiesError';
  }
}

export class FetchError extends Error {
  constructor(
    public readonly url: string,
    public readonly status: number,
    statusText: string
  ) {
    super(`HTTP ${status}${statusText ? ` ${statusText}` : ''}: ${url}`);
    this.name = 'FetchError';
  }
}
