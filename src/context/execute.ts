import type { StandardSchemaV1 } from '@standard-schema/spec';
import { getHttpError } from '../error/httpError.js';
import type { ResponseFormat } from '../types/query.js';
import type { ApiRequest, FetchClientProviderDefinition } from '../types/request.js';
import type { ApiResponse, FailureKind } from '../types/response.js';
import { deserializeBody } from '../utils/deserialize.js';
import { validator } from '../utils/validator.js';
import { safeWrapAsync } from '../utils/wrap.js';

const LOG_PREFIX = '[contentwire]';

/** What {@link executeRequest} needs from the owning context. */
export interface ExecutionContext {
  fetchClient: FetchClientProviderDefinition;
  debug: boolean;
}

interface FailureDetails {
  uri: string | null;
  kind: FailureKind;
  error: Error;
  statusCode?: number;
  statusDescription?: string;
  data?: unknown;
  responseTime?: number | null;
}

function elapsedSince(start: number): number {
  return Math.round((performance.now() - start) * 100) / 100;
}

/**
 * Builds the response reported for a failed call. Status defaults to 500 for failures
 * where the server gave none.
 */
export function failureResponse({
  uri,
  kind,
  error,
  statusCode = 500,
  statusDescription = 'Internal Server Error',
  data = null,
  responseTime = null,
}: FailureDetails): ApiResponse {
  return {
    statusCode,
    statusDescription,
    data,
    info: {
      uri,
      responseTime,
      errorMessage: error.message,
      stackTrace: error.stack ?? null,
    },
    failure: { kind, error },
  };
}

/**
 * Logs a captured failure when `debug` is on, and returns the response unchanged.
 */
export function reportFailure(debug: boolean, method: string, response: ApiResponse): ApiResponse {
  if (debug && response.failure) {
    console.warn(
      `${LOG_PREFIX} ${method} ${response.info.uri ?? '<unknown>'} failed (${response.failure.kind}): ${response.failure.error.message}`,
    );
  }

  return response;
}

async function decode(text: string, format: ResponseFormat, schema?: StandardSchemaV1) {
  const [errBody, body] = deserializeBody(text, format);
  if (errBody) {
    return [errBody, null] as const;
  }

  if (!schema || body === null) {
    return [null, body] as const;
  }

  return validator(body, schema);
}

/**
 * Sends a built request and turns every outcome into an {@link ApiResponse}.
 *
 * - 2xx: body deserialized per `responseFormat` (empty body is `data: null`) and validated
 *   with `schema` when given.
 * - non-2xx: status and description from the server, body still parsed when it parses,
 *   `failure.kind` is `http`.
 * - no response at all: status 500, `failure.kind` is `transport`.
 * - body read, parse or validation errors: status 500, `failure.kind` is `unexpected`.
 *
 * Never rejects for those failures.
 */
export function executeRequest<Schema extends StandardSchemaV1>(
  ctx: ExecutionContext,
  request: ApiRequest,
  responseFormat: ResponseFormat,
  schema: Schema,
): Promise<ApiResponse<StandardSchemaV1.InferOutput<Schema>>>;
export function executeRequest(
  ctx: ExecutionContext,
  request: ApiRequest,
  responseFormat: ResponseFormat,
  schema?: StandardSchemaV1,
): Promise<ApiResponse>;
export async function executeRequest(
  { fetchClient, debug }: ExecutionContext,
  request: ApiRequest,
  responseFormat: ResponseFormat,
  schema?: StandardSchemaV1,
): Promise<ApiResponse> {
  const { url: uri, method } = request;
  const start = performance.now();

  const [errProvider, sent] = await safeWrapAsync(() => fetchClient.send(request));
  if (errProvider) {
    const error = new Error(`error sending ${method} request in execute`, { cause: errProvider });
    return reportFailure(debug, method, failureResponse({ uri, kind: 'unexpected', error }));
  }

  const [errSend, response] = sent;
  if (errSend) {
    const httpError = getHttpError(errSend);
    if (!httpError) {
      return reportFailure(
        debug,
        method,
        failureResponse({ uri, kind: 'transport', error: errSend, responseTime: elapsedSince(start) }),
      );
    }

    // Error bodies usually carry the server's explanation, keep it when it parses
    const [errText, text] = await safeWrapAsync(() => httpError.response.text());
    const responseTime = elapsedSince(start);
    const data = errText ? null : (await decode(text, responseFormat, schema))[1];

    return reportFailure(
      debug,
      method,
      failureResponse({
        uri,
        kind: 'http',
        error: errSend,
        statusCode: httpError.status,
        statusDescription: httpError.statusText,
        data,
        responseTime,
      }),
    );
  }

  const [errText, text] = await safeWrapAsync(() => response.text());
  const responseTime = elapsedSince(start);
  if (errText) {
    const error = new Error('error reading response body in execute', { cause: errText });
    return reportFailure(debug, method, failureResponse({ uri, kind: 'unexpected', error, responseTime }));
  }

  const [errData, data] = await decode(text, responseFormat, schema);
  if (errData) {
    const error = new Error(`error decoding ${responseFormat} response in execute`, { cause: errData });
    return reportFailure(debug, method, failureResponse({ uri, kind: 'unexpected', error, responseTime }));
  }

  if (debug) {
    console.debug(`${LOG_PREFIX} ${method} ${uri} -> ${response.status} (${responseTime}ms)`);
  }

  return {
    statusCode: response.status,
    statusDescription: response.statusText,
    data,
    info: { uri, responseTime, errorMessage: null, stackTrace: null },
    failure: null,
  };
}
