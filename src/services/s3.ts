import { S3Client } from '@aws-sdk/client-s3';
import { AWS_REGION } from '../config';

export function createS3Client(region: string = AWS_REGION): S3Client {
  return new S3Client({ region });
}
