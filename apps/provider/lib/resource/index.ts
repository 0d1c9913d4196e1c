export {
  type ResourceResult,
  S3ObjectResource,
  S3_OBJECT_RESOURCE_TYPE,
  requiresReplace,
} from './s3-object'
