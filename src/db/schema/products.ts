import {
  pgTable,
  varchar,
  text,
  bigserial,
  boolean,
  doublePrecision,
  index,
} from 'drizzle-orm/pg-core';

/**
 * Per-user product catalogue used to classify listings.
 * A listing matches a product when every match term occurs in its title.
 */
export const userProducts = pgTable(
  'user_products',
  {
    id: bigserial('id', { mode: 'number' }).primaryKey(),
    uniqueUserId: varchar('unique_userid').notNull(),
    productName: varchar('product_name').notNull(),
    matchTerms: text('match_terms').array().notNull(),
    preferred: boolean('preferred').notNull().default(false),
    goodDealPrice: doublePrecision('good_deal_price'),
    nearGoodDealPrice: doublePrecision('near_good_deal_price'),
  },
  (table) => [index('idx_user_products_user').on(table.uniqueUserId)],
);

export type UserProductRow = typeof userProducts.$inferSelect;
