import { describe, expect, it } from 'vitest';
import { RemoteServiceError } from '../../errors/index.js';
import {
  buildCompleteMultipartXml,
  parseCompleteMultipartResponse,
  parseInitiateMultipartResponse,
} from '../multipart.js';

describe('parseInitiateMultipartResponse', () => {
  it('reads the upload id', () => {
    const xml = `<?xml version="1.0" encoding="UTF-8"?>
      <InitiateMultipartUploadResult xmlns="http://s3.amazonaws.com/doc/2006-03-01/">
        <Bucket>test-bucket</Bucket>
        <Key>big.bin</Key>
        <UploadId>upload-123</UploadId>
      </InitiateMultipartUploadResult>`;
    expect(parseInitiateMultipartResponse(xml)).toEqual({
      bucket: 'test-bucket',
      key: 'big.bin',
      uploadId: 'upload-123',
    });
  });

  it('rejects a response without an upload id', () => {
    expect(() =>
      parseInitiateMultipartResponse('<InitiateMultipartUploadResult></InitiateMultipartUploadResult>')
    ).toThrow(RemoteServiceError);
  });
});

describe('parseCompleteMultipartResponse', () => {
  it('reads location and unquoted ETag', () => {
    const xml = `<CompleteMultipartUploadResult>
        <Location>https://test-bucket.example.com/big.bin</Location>
        <Bucket>test-bucket</Bucket>
        <Key>big.bin</Key>
        <ETag>"abc-3"</ETag>
      </CompleteMultipartUploadResult>`;
    expect(parseCompleteMultipartResponse(xml)).toEqual({
      location: 'https://test-bucket.example.com/big.bin',
      bucket: 'test-bucket',
      key: 'big.bin',
      eTag: 'abc-3',
    });
  });
});

describe('buildCompleteMultipartXml', () => {
  it('writes parts in the given order with quoted ETags', () => {
    expect(
      buildCompleteMultipartXml([
        { partNumber: 1, eTag: 'e1' },
        { partNumber: 2, eTag: '"e2"' },
      ])
    ).toBe(
      '<CompleteMultipartUpload>' +
        '<Part><PartNumber>1</PartNumber><ETag>"e1"</ETag></Part>' +
        '<Part><PartNumber>2</PartNumber><ETag>"e2"</ETag></Part>' +
        '</CompleteMultipartUpload>'
    );
  });
});
