/**
 * @fileoverview Handshake wire constants.
 * @module constants/kemtls
 */

export const MESSAGE_TYPES = {
    CLIENT_HELLO: 0x01,
    SERVER_HELLO: 0x02,
    SERVER_CERTIFICATE: 0x03,
    SERVER_KEMTLS_AUTH: 0x04,
    CLIENT_FINISHED: 0x05,
    SERVER_FINISHED: 0x06,
    ENCRYPTED_DATA: 0x10,
    ALERT: 0xff,
} as const;

/** type (u8) + length (u32 BE) */
export const FRAME_HEADER_LENGTH = 5;

/** 1 MiB; SLH-DSA certificates stay far below this */
export const MAX_FRAME_PAYLOAD = 1024 * 1024;

/** Length prefix of each payload field (u32 BE) */
export const FIELD_LENGTH_PREFIX = 4;

export const TRANSCRIPT_HASH_LENGTH = 32;

// ============================================================================
// SESSION KEY DERIVATION
// ============================================================================

export const SESSION_KEY_SALT = 'KEMTLS-Session-Keys';

export const SESSION_KEY_INFO_PREFIX = 'PQ-OIDC-v1|';

export const SESSION_KEY_LENGTHS = {
    encryptionKey: 32,
    macKey: 32,
    iv: 16,
} as const;
