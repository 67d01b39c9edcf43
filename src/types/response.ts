/** Which path of the execution pipeline produced a failure. */
export type FailureKind =
  /** The server answered with a non-2xx status. */
  | 'http'
  /** No response was received (DNS, refused connection, reset). */
  | 'transport'
  /** Anything else while reading, parsing or validating the response. */
  | 'unexpected';

/** Metadata attached to every response, whether the call succeeded or not. */
export interface ResponseInfo {
  uri: string | null;
  /** Milliseconds from sending the request until the body was read. */
  responseTime: number | null;
  errorMessage: string | null;
  stackTrace: string | null;
}

export interface ResponseFailure {
  kind: FailureKind;
  error: Error;
}

/**
 * Typed result of a data context call. Operational failures never reject,
 * they surface here through `statusCode`, `info` and `failure`.
 */
export interface ApiResponse<Data = unknown> {
  statusCode: number;
  statusDescription: string;
  /** Parsed payload, `null` for empty bodies and for failures without a parseable body. */
  data: Data | null;
  info: ResponseInfo;
  failure: ResponseFailure | null;
}
