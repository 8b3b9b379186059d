/**
 * Wayfarer Type Definitions
 */

// ==================== Identity ====================

/**
 * Who is making the request. Produced only by successful token validation,
 * never persisted, lives for one request.
 */
export interface Identity {
  userId: number;
  email: string;
}

/**
 * Claims carried by a signed token. Timestamps are Unix seconds.
 */
export interface TokenClaims {
  /** Subject - account email */
  subject: string;
  userId: number;
  issuedAt: number;
  expiresAt: number;
}

/**
 * The slice of an account the credential check needs, and nothing more
 */
export interface AccountCredentials {
  userId: number;
  email: string;
  credentialHash: string;
}

/**
 * Public view of an account. Never carries the credential hash.
 */
export interface UserProfile {
  id: number;
  email: string;
  displayName: string | null;
  createdAt: string;
}

export interface NewAccount {
  email: string;
  credentialHash: string;
  displayName?: string | null;
}

// ==================== Resources ====================

/**
 * Anything a single user owns and alone may mutate
 */
export interface OwnedResource {
  ownerId: number;
}

export interface Trip extends OwnedResource {
  id: number;
  title: string;
  description: string | null;
  photos: string[];
  tags: string[];
  latitude: number | null;
  longitude: number | null;
  createdAt: string;
  updatedAt: string;
}

/**
 * Trip as shown in public listings
 */
export interface TripSummary {
  id: number;
  title: string;
  description: string | null;
  photos: string[];
  tags: string[];
}

/**
 * Trip detail with author information
 */
export interface TripDetail extends Trip {
  authorId: number;
  authorEmail: string;
  authorDisplayName: string | null;
}

export interface NewTrip {
  title: string;
  description?: string | null;
  photos?: string[];
  tags?: string[];
  latitude?: number | null;
  longitude?: number | null;
}

export type TripChanges = Partial<NewTrip>;

// ==================== API payloads ====================

/**
 * Returned by register, login and the current-user endpoint.
 * `token` is absent on the current-user endpoint.
 */
export interface AuthResponse {
  token?: string;
  tokenType?: "Bearer";
  userId: number;
  email: string;
  displayName: string | null;
}
