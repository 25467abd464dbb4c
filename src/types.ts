/**
 * Shared types for the relay.
 */

// ============================================================================
// DOMAIN
// ============================================================================

export interface User {
  id: number;
  username: string;
  password_hash: string;
}

/** The caller as established by a verified token. */
export interface AuthUser {
  id: number;
  username: string;
}

export type ChatRequestStatus = 'pending' | 'accepted';

export interface PendingChatRequest {
  requester_username: string;
  status: ChatRequestStatus;
}

/**
 * One message as a particular participant sees it: `encrypted_blob` is the
 * ciphertext encrypted for that participant.
 */
export interface MessageRecord {
  id: number;
  sender_id: number;
  recipient_id: number;
  timestamp: string;
  sender_username: string;
  encrypted_blob: string;
}

export interface StoredMessage {
  id: number;
  timestamp: string;
}

// ============================================================================
// HONO
// ============================================================================

export type AppEnv = {
  Variables: {
    requestId: string;
    user: AuthUser;
  };
};
