export { buildJsonRequest, createNetworkClient, isRecoverableNetworkError } from './network-client.js';
export type {
  HttpMethod,
  NetworkClient,
  NetworkClientOptions,
  NetworkError,
  NetworkErrorType,
  NetworkRequest,
} from './types.js';
