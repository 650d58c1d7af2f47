/**
 * HTTP Module
 * @module http
 */

export {
  FetchServiceClient,
  type ServiceClient,
  type ServiceResponse,
  type FetchServiceClientOptions,
} from './service-client.js';
