export {
  CommunicationError,
  NotFoundError,
  isApiClientError,
  type ApiClientError,
  type CommunicationErrorDetails,
  type NotFoundResource,
} from './errors';
export {
  createSigner,
  signParams,
  signatureFor,
  timestampSeconds,
  type AuthParams,
  type Clock,
  type Credentials,
  type QueryParams,
  type SignedParams,
  type Signer,
} from './signer';
export {
  ConfigError,
  DEFAULT_BASE_URL,
  DEFAULT_ENV_FILE,
  DEFAULT_TIMEOUT_MS,
  loadApiConfig,
  parseApiConfig,
  pathExists,
  type ApiClientConfig,
  type LoadApiConfigOptions,
} from './config';
export { PAGE_SIZE, ResourceFetcher, type FetchFn, type ResourceFetcherOptions } from './fetcher';
