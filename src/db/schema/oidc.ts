import { sql } from 'drizzle-orm';
import {
    boolean,
    check,
    index,
    integer,
    pgTable,
    text,
    timestamp,
    uuid,
    varchar,
} from 'drizzle-orm/pg-core';

// ============================================================================
// REGISTRIES
// ============================================================================

export const users = pgTable('users', {
    id: uuid('id').primaryKey(),
    username: varchar('username', { length: 255 }).notNull().unique(),
    email: varchar('email', { length: 255 }).notNull(),
    emailVerified: boolean('email_verified').notNull().default(false),
    name: varchar('name', { length: 255 }).notNull(),
    givenName: varchar('given_name', { length: 255 }).notNull().default(''),
    familyName: varchar('family_name', { length: 255 }).notNull().default(''),

    // argon2id
    passwordHash: text('password_hash').notNull(),

    createdAt: timestamp('created_at', { withTimezone: true })
        .notNull()
        .defaultNow(),
});

export const clients = pgTable('clients', {
    clientId: varchar('client_id', { length: 255 }).primaryKey(),
    // SHA-256, hex
    clientSecretHash: varchar('client_secret_hash', { length: 64 }).notNull(),
    name: varchar('name', { length: 255 }).notNull(),
    redirectUris: text('redirect_uris').array().notNull(),
    grantTypes: text('grant_types').array().notNull(),
    responseTypes: text('response_types').array().notNull(),
    scopes: text('scopes').array().notNull(),
    createdAt: timestamp('created_at', { withTimezone: true })
        .notNull()
        .defaultNow(),
});

// ============================================================================
// ISSUED ARTIFACTS
// ============================================================================

export const loginSessions = pgTable(
    'login_sessions',
    {
        tokenHash: varchar('token_hash', { length: 64 }).primaryKey(),
        userId: uuid('user_id')
            .notNull()
            .references(() => users.id, { onDelete: 'cascade' }),
        authTime: integer('auth_time').notNull(),
        createdAt: timestamp('created_at', { withTimezone: true })
            .notNull()
            .defaultNow(),
    },
    (table) => [index('login_session_user_idx').on(table.userId)]
);

export const authorizationCodes = pgTable(
    'authorization_codes',
    {
        code: varchar('code', { length: 128 }).primaryKey(),
        clientId: varchar('client_id', { length: 255 })
            .notNull()
            .references(() => clients.clientId, { onDelete: 'cascade' }),
        userId: uuid('user_id')
            .notNull()
            .references(() => users.id, { onDelete: 'cascade' }),
        redirectUri: text('redirect_uri').notNull(),
        scopes: text('scopes').array().notNull(),
        nonce: text('nonce'),
        authTime: integer('auth_time').notNull(),

        // Flipped once, by the redemption UPDATE
        used: boolean('used').notNull().default(false),

        expiresAt: timestamp('expires_at', { withTimezone: true }).notNull(),
        createdAt: timestamp('created_at', { withTimezone: true })
            .notNull()
            .defaultNow(),
    },
    (table) => [
        // Cleanup
        index('authorization_code_expires_idx').on(table.expiresAt),

        check(
            'authorization_code_expires_future',
            sql`${table.expiresAt} > ${table.createdAt}`
        ),
    ]
);

export const accessTokens = pgTable(
    'access_tokens',
    {
        tokenHash: varchar('token_hash', { length: 64 }).primaryKey(),
        userId: uuid('user_id')
            .notNull()
            .references(() => users.id, { onDelete: 'cascade' }),
        clientId: varchar('client_id', { length: 255 })
            .notNull()
            .references(() => clients.clientId, { onDelete: 'cascade' }),
        scopes: text('scopes').array().notNull(),
        expiresAt: timestamp('expires_at', { withTimezone: true }).notNull(),
        createdAt: timestamp('created_at', { withTimezone: true })
            .notNull()
            .defaultNow(),
    },
    (table) => [index('access_token_expires_idx').on(table.expiresAt)]
);
