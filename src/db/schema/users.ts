import {
  pgTable,
  varchar,
  bigint,
  bigserial,
  boolean,
  doublePrecision,
  timestamp,
  index,
  uniqueIndex,
} from 'drizzle-orm/pg-core';

// ─── Users ───────────────────────────────────────────────────────────────────

export const users = pgTable('users', {
  uniqueUserId: varchar('unique_userid').primaryKey(),
  chatId: bigint('user_id', { mode: 'number' }).notNull(),
  activationStatus: boolean('activation_status').notNull().default(false),
  // Kept as text: rows are edited by hand and may hold malformed dates
  expiryDate: varchar('expiry_date').notNull().default('1970-01-01'),
  location: varchar('location').notNull(),
  fixedLat: doublePrecision('fixed_lat').notNull(),
  fixedLon: doublePrecision('fixed_lon').notNull(),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow(),
});

// ─── Keywords ────────────────────────────────────────────────────────────────

export const keywords = pgTable(
  'keywords',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    uniqueUserId: varchar('unique_userid').notNull(),
    keyword: varchar('keyword').notNull(),
  },
  (table) => [
    index('idx_keywords_user').on(table.uniqueUserId),
    uniqueIndex('uq_keywords_user_keyword').on(table.uniqueUserId, table.keyword),
  ],
);

// ─── Excluded Words ──────────────────────────────────────────────────────────

export const excludedWords = pgTable(
  'excluded_words',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    uniqueUserId: varchar('unique_userid').notNull(),
    excludedWord: varchar('excluded_word').notNull(),
  },
  (table) => [index('idx_excluded_words_user').on(table.uniqueUserId)],
);

// ─── Filter Modes ────────────────────────────────────────────────────────────

export const userModes = pgTable('user_modes', {
  uniqueUserId: varchar('unique_userid').primaryKey(),
  modeOnlyPreferred: boolean('mode_only_preferred').notNull().default(false),
  nearGoodDeals: boolean('near_good_deals').notNull().default(false),
  goodDeals: boolean('good_deals').notNull().default(false),
});
