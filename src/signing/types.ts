/**
 * Signing types for S3 Signature V4 authentication
 */

export interface Credentials {
  accessKeyId: string;
  secretAccessKey: string;
  region: string;
  /** Defaults to "s3" */
  service?: string;
  /** Temporary credentials add an x-amz-security-token header/parameter */
  sessionToken?: string;
}

export interface SigningRequest {
  method: string;
  url: URL;
  headers?: Record<string, string>;
  payload?: Uint8Array | string;
  /** Extra query parameters (raw, unencoded), merged over those in `url` */
  query?: Record<string, string>;
  /** Precomputed payload hash, e.g. UNSIGNED-PAYLOAD */
  payloadHash?: string;
}

export interface PresignRequest {
  method: string;
  url: URL;
  /** Seconds, 1 to 604800 (7 days) */
  expiresIn: number;
  query?: Record<string, string>;
}

export interface PresignedUrl {
  url: string;
  expiresAt: Date;
  method: string;
}
