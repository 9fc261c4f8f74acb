/**
 * CreateBucketConfiguration request body
 */

import { buildXml, S3_XML_NAMESPACE, XML_DECLARATION, type XmlElement } from './parser.js';

export interface CreateBucketConfiguration {
  /** Omitted from the document for us-east-1 */
  region?: string;
  /** Directory buckets: location type, e.g. AvailabilityZone */
  locationType?: string;
  /** Directory buckets: location name, e.g. a zone id */
  locationName?: string;
  /** Directory buckets: bucket type, e.g. Directory */
  bucketType?: string;
  /** Directory buckets: e.g. SingleAvailabilityZone */
  dataRedundancy?: string;
}

/**
 * Builds the CreateBucketConfiguration document, or undefined when no
 * element would be written (default region and no directory settings).
 */
export function buildCreateBucketXml(config: CreateBucketConfiguration): string | undefined {
  const body: XmlElement = { '@_xmlns': S3_XML_NAMESPACE };
  let hasContent = false;

  if (config.region && config.region !== 'us-east-1') {
    body.LocationConstraint = config.region;
    hasContent = true;
  }

  if (config.locationType || config.locationName) {
    const location: XmlElement = {};
    if (config.locationName) location.Name = config.locationName;
    if (config.locationType) location.Type = config.locationType;
    body.Location = location;
    hasContent = true;
  }

  if (config.bucketType || config.dataRedundancy) {
    const bucket: XmlElement = {};
    if (config.dataRedundancy) bucket.DataRedundancy = config.dataRedundancy;
    if (config.bucketType) bucket.Type = config.bucketType;
    body.Bucket = bucket;
    hasContent = true;
  }

  if (!hasContent) {
    return undefined;
  }

  return XML_DECLARATION + buildXml({ CreateBucketConfiguration: body });
}
