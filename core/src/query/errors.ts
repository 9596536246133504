/** The part of a search request that failed to parse. */
export type RequestPart = 'body' | 'sort' | 'adapter';

/** A search request that is malformed outside its filter expression. */
export class RequestParseError extends Error {
  readonly code = 'request_parse_error';
  readonly part: RequestPart;
  /** The offending input as received, when there is one. */
  readonly input?: string;

  constructor(part: RequestPart, message: string, input?: string) {
    super(message);
    this.name = 'RequestParseError';
    this.part = part;
    this.input = input;
  }

  /** Error fields for a response body, e.g. `{ sort: 'a;drop' }`. */
  toPayload(): Record<string, string> {
    return this.input === undefined ? {} : { [this.part]: this.input };
  }
}
