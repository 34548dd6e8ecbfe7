/** Facts about an outgoing request, captured at the moment of dispatch. */
export interface AuthRequest {
  /** Logical method, e.g. `PUT` even when tunnelled through POST */
  method: string;
  /** Resolved path plus query string */
  path: string;
  /** Serialized body that gets signed, `''` when there is none */
  body: string;
}

/**
 * Produces the authentication headers for one request. They are merged last and
 * win over default and per-call headers with the same name.
 */
export interface AuthHeaderBuilder {
  headers(request: AuthRequest): Record<string, string>;
}
