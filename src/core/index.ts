/**
 * Client entrypoint: the base client, the key and token clients, and their config schemas.
 * @module
 */
export { ApiClient, DEFAULT_USER_AGENT, METHOD_OVERRIDE_HEADER } from './client.js';
export { type ClientConfig, clientConfigSchema, keyClientConfigSchema, tokenClientConfigSchema } from './config.js';
export { createKeyClient, KeyClient, type KeyClientProps } from './keyClient.js';
export { createTokenClient, TokenClient, type TokenClientProps } from './tokenClient.js';
export type {
  ApiClientOptions,
  ApiClientProps,
  FormFields,
  HttpMethod,
  OutgoingBody,
  OutgoingRequest,
  RequestOptions,
  UploadFile,
} from './types.js';
