export {
  LocalBlobGateway,
  BlobNotFoundError,
  mimeTypeForFile,
  type BlobGateway,
  type BlobObject,
  type LocalBlobGatewayOptions,
} from './blob-gateway.js';
