/**
 * HTTP oracle adapter.
 *
 * POSTs each request as JSON to a classification endpoint. The response
 * body is the oracle text, or one string field of a JSON body when
 * `responseField` is configured.
 */

import http from 'node:http';
import https from 'node:https';

import { OracleError } from '../errors/errors.ts';
import {
  type ClassificationOracle,
  DEFAULT_MAX_RESPONSE_BYTES,
  type OracleCallOptions,
  type OracleConfig,
  type OracleRequest,
} from './types.ts';

export interface HttpOracleConfig extends OracleConfig {
  readonly url: string;
  readonly headers?: Readonly<Record<string, string>>;
  /** Name of the JSON body field holding the oracle text. */
  readonly responseField?: string;
}

const ERROR_BODY_PREVIEW = 200;

function transportFor(url: URL): typeof http.request {
  if (url.protocol === 'https:') {
    return https.request;
  }
  if (url.protocol === 'http:') {
    return http.request;
  }
  throw new OracleError('ORACLE_NOT_CONFIGURED', `Unsupported oracle URL protocol ${url.protocol}`);
}

/**
 * Pull the oracle text out of a response body.
 *
 * @throws {OracleError} `ORACLE_INVALID_RESPONSE` when the field is absent or not a string.
 */
export function readResponseField(body: string, field: string | undefined): string {
  if (field === undefined) {
    return body;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    throw new OracleError('ORACLE_INVALID_RESPONSE', 'Oracle response body is not JSON', {
      cause: error,
    });
  }
  const value: unknown =
    typeof parsed === 'object' && parsed !== null ? Reflect.get(parsed, field) : undefined;
  if (typeof value !== 'string') {
    throw new OracleError(
      'ORACLE_INVALID_RESPONSE',
      `Oracle response has no string field "${field}"`,
    );
  }
  return value;
}

/**
 * POST one request to the endpoint.
 *
 * @throws {OracleError} on transport failure, non-2xx status or an oversized body.
 */
export function postOracleRequest(
  config: HttpOracleConfig,
  request: OracleRequest,
  { signal }: OracleCallOptions,
): Promise<string> {
  const url = new URL(config.url);
  const send = transportFor(url);
  const maxBytes = config.maxResponseBytes ?? DEFAULT_MAX_RESPONSE_BYTES;
  const postData = JSON.stringify({
    ...(config.model === undefined ? {} : { model: config.model }),
    ...request,
  });

  return new Promise<string>((resolve, reject) => {
    const req = send(
      url,
      {
        method: 'POST',
        signal,
        headers: {
          'User-Agent': 'whatif-gate',
          Accept: 'application/json',
          ...config.headers,
          'Content-Type': 'application/json',
          'Content-Length': Buffer.byteLength(postData),
        },
      },
      (res) => {
        const chunks: Buffer[] = [];
        let received = 0;

        res.on('data', (chunk: Buffer) => {
          received += chunk.length;
          if (received > maxBytes) {
            reject(
              new OracleError(
                'ORACLE_CALL_FAILED',
                `Oracle response exceeded ${maxBytes} bytes`,
                { details: { maxResponseBytes: maxBytes } },
              ),
            );
            req.destroy();
            return;
          }
          chunks.push(chunk);
        });

        res.on('end', () => {
          const body = Buffer.concat(chunks).toString('utf8');
          const status = res.statusCode ?? 0;
          if (status < 200 || status >= 300) {
            reject(
              new OracleError(
                'ORACLE_CALL_FAILED',
                `Oracle endpoint returned HTTP ${status}: ${body.slice(0, ERROR_BODY_PREVIEW)}`,
                { details: { statusCode: status } },
              ),
            );
            return;
          }
          try {
            resolve(readResponseField(body, config.responseField));
          } catch (error) {
            reject(error);
          }
        });
      },
    );

    req.on('error', (error) => {
      reject(
        new OracleError(
          'ORACLE_CALL_FAILED',
          signal.aborted ? 'Oracle request aborted' : `Oracle request failed: ${error.message}`,
          { cause: error, details: { host: url.host } },
        ),
      );
    });

    req.write(postData);
    req.end();
  });
}

/**
 * @throws {OracleError} `ORACLE_NOT_CONFIGURED` for a URL that is neither http nor https.
 */
export function createHttpOracle(config: HttpOracleConfig): ClassificationOracle {
  const url = new URL(config.url);
  transportFor(url);
  return {
    name: `http:${url.host}`,
    classify: (request, options) => postOracleRequest(config, request, options),
  };
}
