export { DEFAULT_REFRESH_INTERVAL, type ManagedRequestOptions, TokenManager, type TokenManagerProps } from './manager.js';
