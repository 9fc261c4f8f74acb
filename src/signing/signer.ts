/**
 * SigV4Signer - S3 Signature V4 request signing and URL presigning
 */

import { inspect } from 'node:util';
import { AuthenticationInputError } from '../errors/index.js';
import { hmacSha256, sha256Hex, toHex } from './crypto.js';
import {
  createCanonicalRequest,
  decodePath,
  getCanonicalQueryString,
  getCanonicalUri,
  getSignedHeaders,
  parseQueryString,
} from './canonical.js';
import { formatAmzDate, formatDateStamp, parseAmzDate } from './format.js';
import { deriveSigningKey } from './key-derivation.js';
import type { Credentials, PresignedUrl, PresignRequest, SigningRequest } from './types.js';

export const ALGORITHM = 'AWS4-HMAC-SHA256';
export const UNSIGNED_PAYLOAD = 'UNSIGNED-PAYLOAD';
export const EMPTY_SHA256 =
  'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855';
export const MAX_PRESIGN_EXPIRES = 604800;

export class SigV4Signer {
  private readonly accessKeyId: string;
  private readonly secretAccessKey: string;
  private readonly sessionToken?: string;
  readonly region: string;
  readonly service: string;

  constructor(credentials: Credentials) {
    this.accessKeyId = credentials.accessKeyId;
    this.secretAccessKey = credentials.secretAccessKey;
    this.sessionToken = credentials.sessionToken;
    this.region = credentials.region;
    this.service = credentials.service ?? 's3';
  }

  /**
   * Hash payload and return hex string
   * Empty body returns EMPTY_SHA256 constant
   */
  hashPayload(payload?: Uint8Array | string): string {
    if (!payload || payload.length === 0) {
      return EMPTY_SHA256;
    }
    return sha256Hex(payload);
  }

  /**
   * Sign a request and return the complete header set to send.
   *
   * Header names come back lowercased. host, x-amz-date,
   * x-amz-content-sha256, x-amz-security-token (with temporary
   * credentials) and authorization are added. A caller-supplied
   * x-amz-date is kept and used as the signing time.
   */
  signRequest(request: SigningRequest, now?: Date): Record<string, string> {
    const url = request.url;
    if (!url.host) {
      throw new AuthenticationInputError({
        message: `Cannot sign a request without a host: ${url.toString()}`,
        code: 'MISSING_HOST',
      });
    }

    const headers = lowercaseHeaders(request.headers ?? {});
    headers['host'] = url.host;

    let timestamp: Date;
    const suppliedDate = headers['x-amz-date'];
    if (suppliedDate !== undefined) {
      const parsed = parseAmzDate(suppliedDate);
      if (!parsed) {
        throw new AuthenticationInputError({
          message: `Invalid x-amz-date header: ${suppliedDate}`,
          code: 'INVALID_DATE',
        });
      }
      timestamp = parsed;
    } else {
      timestamp = now ?? new Date();
      headers['x-amz-date'] = formatAmzDate(timestamp);
    }

    const amzDate = formatAmzDate(timestamp);
    const dateStamp = formatDateStamp(timestamp);

    const payloadHash =
      request.payloadHash ?? headers['x-amz-content-sha256'] ?? this.hashPayload(request.payload);
    headers['x-amz-content-sha256'] = payloadHash;

    if (this.sessionToken) {
      headers['x-amz-security-token'] = this.sessionToken;
    }

    const signedHeaders = Object.keys(headers).sort();
    const canonicalRequest = createCanonicalRequest({
      method: request.method,
      path: decodePath(url.pathname),
      query: { ...parseQueryString(url.search), ...request.query },
      headers,
      signedHeaders,
      payloadHash,
    });

    const credentialScope = this.credentialScope(dateStamp);
    const signature = this.calculateSignature(dateStamp, amzDate, canonicalRequest);

    headers['authorization'] = [
      `${ALGORITHM} Credential=${this.accessKeyId}/${credentialScope}`,
      `SignedHeaders=${getSignedHeaders(signedHeaders)}`,
      `Signature=${signature}`,
    ].join(', ');

    return headers;
  }

  /**
   * Generate a presigned URL. Only the host header is signed and the
   * payload is UNSIGNED-PAYLOAD.
   */
  presignUrl(request: PresignRequest, now?: Date): PresignedUrl {
    const { expiresIn, url } = request;
    if (!Number.isInteger(expiresIn) || expiresIn < 1 || expiresIn > MAX_PRESIGN_EXPIRES) {
      throw new AuthenticationInputError({
        message: `Presigned URL expiration must be an integer between 1 and ${MAX_PRESIGN_EXPIRES} seconds, got ${expiresIn}`,
        code: 'INVALID_EXPIRES',
      });
    }
    if (!url.host) {
      throw new AuthenticationInputError({
        message: `Cannot presign a URL without a host: ${url.toString()}`,
        code: 'MISSING_HOST',
      });
    }

    const timestamp = now ?? new Date();
    const amzDate = formatAmzDate(timestamp);
    const dateStamp = formatDateStamp(timestamp);
    const credentialScope = this.credentialScope(dateStamp);

    const query: Record<string, string> = {
      ...parseQueryString(url.search),
      ...request.query,
      'X-Amz-Algorithm': ALGORITHM,
      'X-Amz-Credential': `${this.accessKeyId}/${credentialScope}`,
      'X-Amz-Date': amzDate,
      'X-Amz-Expires': String(expiresIn),
      'X-Amz-SignedHeaders': 'host',
    };
    if (this.sessionToken) {
      query['X-Amz-Security-Token'] = this.sessionToken;
    }

    const path = decodePath(url.pathname);
    const canonicalRequest = createCanonicalRequest({
      method: request.method,
      path,
      query,
      headers: { host: url.host },
      signedHeaders: ['host'],
      payloadHash: UNSIGNED_PAYLOAD,
    });
    const signature = this.calculateSignature(dateStamp, amzDate, canonicalRequest);

    const queryString = `${getCanonicalQueryString(query)}&X-Amz-Signature=${signature}`;

    return {
      url: `${url.protocol}//${url.host}${getCanonicalUri(path)}?${queryString}`,
      expiresAt: new Date(timestamp.getTime() + expiresIn * 1000),
      method: request.method.toUpperCase(),
    };
  }

  toJSON(): Record<string, string> {
    return { accessKeyId: this.accessKeyId, region: this.region, service: this.service };
  }

  [inspect.custom](): string {
    return `SigV4Signer ${JSON.stringify(this.toJSON())}`;
  }

  private credentialScope(dateStamp: string): string {
    return `${dateStamp}/${this.region}/${this.service}/aws4_request`;
  }

  private calculateSignature(dateStamp: string, amzDate: string, canonicalRequest: string): string {
    const stringToSign = [
      ALGORITHM,
      amzDate,
      this.credentialScope(dateStamp),
      sha256Hex(canonicalRequest),
    ].join('\n');

    const signingKey = deriveSigningKey(this.secretAccessKey, dateStamp, this.region, this.service);
    return toHex(hmacSha256(signingKey, stringToSign));
  }
}

/**
 * Copy headers with lowercased names. Two names that differ only in case
 * are rejected.
 */
function lowercaseHeaders(headers: Record<string, string>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    const lower = name.toLowerCase();
    if (lower in result) {
      throw new AuthenticationInputError({
        message: `Duplicate header '${lower}' with different casing`,
        code: 'DUPLICATE_HEADER',
        details: { header: lower },
      });
    }
    result[lower] = value;
  }
  return result;
}
