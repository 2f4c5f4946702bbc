import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { S3Manager } from '../s3-manager';
import { DeleteObjectsCommand, ListObjectsV2Command, PutObjectCommand } from '@aws-sdk/client-s3';

const { send } = vi.hoisted(() => ({ send: vi.fn() }));

// Mock the AWS SDK; commands keep their input for assertions
vi.mock('@aws-sdk/client-s3', () => ({
  S3Client: class {
    send = send;
  },
  PutObjectCommand: class {
    constructor(readonly input: unknown) {}
  },
  ListObjectsV2Command: class {
    constructor(readonly input: unknown) {}
  },
  DeleteObjectsCommand: class {
    constructor(readonly input: unknown) {}
  }
}));

function awsError(name: string, message: string): Error {
  const error = new Error(message);
  error.name = name;
  return error;
}

describe('S3Manager', () => {
  let s3Manager: S3Manager;

  beforeEach(() => {
    send.mockReset();
    s3Manager = new S3Manager({ region: 'eu-west-1' });
  });

  describe('upload', () => {
    let workDir: string;

    beforeEach(() => {
      workDir = mkdtempSync(join(tmpdir(), 's3-manager-'));
    });

    afterEach(() => {
      rmSync(workDir, { recursive: true, force: true });
    });

    it('should put the file with a content type from its extension', async () => {
      const localPath = join(workDir, 'function-api.yaml');
      writeFileSync(localPath, 'Resources: {}');
      send.mockResolvedValueOnce({ ETag: '"abc123"' });

      const result = await s3Manager.upload('demo-artifacts', 'function-api.yaml', localPath);

      expect(result).toEqual({ etag: '"abc123"' });
      const command = send.mock.calls[0][0];
      expect(command).toBeInstanceOf(PutObjectCommand);
      expect(command.input).toEqual({
        Bucket: 'demo-artifacts',
        Key: 'function-api.yaml',
        Body: Buffer.from('Resources: {}'),
        ContentType: 'application/x-yaml'
      });
    });

    it('should use application/zip for code bundles', async () => {
      const localPath = join(workDir, 'function.zip');
      writeFileSync(localPath, 'zip');
      send.mockResolvedValueOnce({});

      await s3Manager.upload('demo-artifacts', 'function.zip', localPath);

      expect(send.mock.calls[0][0].input.ContentType).toBe('application/zip');
    });

    it('should wrap SDK failures in a ProviderError', async () => {
      const localPath = join(workDir, 'function.zip');
      writeFileSync(localPath, 'zip');
      send.mockRejectedValueOnce(awsError('NoSuchBucket', 'The specified bucket does not exist'));

      await expect(s3Manager.upload('demo-artifacts', 'function.zip', localPath)).rejects.toMatchObject({
        code: 'NoSuchBucket',
        message: 'The specified bucket does not exist'
      });
    });
  });

  describe('listKeys', () => {
    it('should follow continuation tokens', async () => {
      send
        .mockResolvedValueOnce({ Contents: [{ Key: 'a.yaml' }, { Key: 'b.yaml' }], IsTruncated: true, NextContinuationToken: 'next' })
        .mockResolvedValueOnce({ Contents: [{ Key: 'c.zip' }], IsTruncated: false });

      const keys = await s3Manager.listKeys('demo-artifacts');

      expect(keys).toEqual(['a.yaml', 'b.yaml', 'c.zip']);
      expect(send.mock.calls[0][0]).toBeInstanceOf(ListObjectsV2Command);
      expect(send.mock.calls[1][0].input).toEqual({ Bucket: 'demo-artifacts', ContinuationToken: 'next' });
    });

    it('should list a missing bucket as empty', async () => {
      send.mockRejectedValueOnce(awsError('NoSuchBucket', 'The specified bucket does not exist'));

      await expect(s3Manager.listKeys('gone')).resolves.toEqual([]);
    });

    it('should rethrow other errors', async () => {
      send.mockRejectedValueOnce(awsError('AccessDenied', 'Access Denied'));

      await expect(s3Manager.listKeys('demo-artifacts')).rejects.toMatchObject({ code: 'AccessDenied' });
    });
  });

  describe('deleteKeys', () => {
    it('should delete in batches of 1000', async () => {
      const keys = Array.from({ length: 1500 }, (_, index) => `object-${index}`);
      send.mockResolvedValue({});

      await s3Manager.deleteKeys('demo-artifacts', keys);

      expect(send).toHaveBeenCalledTimes(2);
      const [first] = send.mock.calls[0];
      expect(first).toBeInstanceOf(DeleteObjectsCommand);
      expect(first.input.Delete.Objects).toHaveLength(1000);
      expect(first.input.Delete.Quiet).toBe(true);
      expect(send.mock.calls[1][0].input.Delete.Objects[499]).toEqual({ Key: 'object-1499' });
    });

    it('should throw when some objects could not be deleted', async () => {
      send.mockResolvedValueOnce({ Errors: [{ Key: 'locked.zip', Code: 'AccessDenied', Message: 'Access Denied' }] });

      await expect(s3Manager.deleteKeys('demo-artifacts', ['locked.zip'])).rejects.toThrow(
        'Failed to delete 1 object(s) from demo-artifacts: locked.zip: AccessDenied Access Denied'
      );
    });
  });

  it('should build a regional object URL', () => {
    expect(s3Manager.objectUrl('demo-artifacts', 'function-api.yaml')).toBe(
      'https://demo-artifacts.s3.eu-west-1.amazonaws.com/function-api.yaml'
    );
  });

  it('should encode each segment of the key but keep its slashes', () => {
    expect(s3Manager.objectUrl('demo-artifacts', 'releases/my template+v1.yaml')).toBe(
      'https://demo-artifacts.s3.eu-west-1.amazonaws.com/releases/my%20template%2Bv1.yaml'
    );
  });
});
