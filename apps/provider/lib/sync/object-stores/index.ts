export { S3ObjectStore, createS3Client, s3ClientConfig, s3FailureReason } from './s3'
