// ============================================================================
// Connection Types
// ============================================================================

export interface ConnectionParameters {
  baseUrl: string;
  username: string;
  password: string;
  site: string;
  verifyTls: boolean;
}

export interface ControllerClientConfig extends ConnectionParameters {
  debug?: boolean;
  // Milliseconds since the epoch; defaults to Date.now
  now?: () => number;
}

/**
 * Opaque handle returned by a successful login. Only the client that issued
 * it will accept it.
 */
export interface Session {
  readonly cookie: string;
  readonly csrfToken?: string;
}

// ============================================================================
// Query Types
// ============================================================================

export interface QueryOptions {
  since?: number; // hours
  startNum?: number;
  limitNum?: number;
  startEpoch?: number;
  endEpoch?: number;
  createdTime?: number;
  deviceMac?: string;
  clientMac?: string;
  networkId?: string;
  wlanId?: string;
}

export type HttpMethod = 'GET' | 'POST';

export interface QueryRequest {
  method: HttpMethod;
  path: string;
  body?: string;
}

// ============================================================================
// Controller Response Types
// ============================================================================

// Usually a list or a mapping, but returned as the controller sent it
export type EnvelopeData = unknown;

export interface Envelope {
  meta: {
    rc: string; // 'ok' | 'error'
    msg?: string;
  };
  data: EnvelopeData;
}

// ============================================================================
// Outcome Types
// ============================================================================

export type FailureKind = 'auth' | 'query' | 'transport' | 'unknown_query';

export interface FailureDescriptor {
  kind: FailureKind;
  message: string;
  query?: string;
  status?: number;
  controllerMessage?: string;
}

export type QueryOutcome =
  | { success: true; query: string; data: EnvelopeData }
  | { success: false; query: string; error: FailureDescriptor };
