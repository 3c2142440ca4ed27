import { eq, inArray } from 'drizzle-orm';
import { getDb } from './connection.js';
import { users, keywords, excludedWords, userModes } from './schema/users.js';
import { userProducts, type UserProductRow } from './schema/products.js';
import type { FilterModes, UserRecord, UserSource } from '../monitor/types.js';

const NO_MODES: FilterModes = { modeOnlyPreferred: false, nearGoodDeals: false, goodDeals: false };

function groupBy<T>(rows: T[], key: (row: T) => string): Map<string, T[]> {
  const grouped = new Map<string, T[]>();
  for (const row of rows) {
    const k = key(row);
    const bucket = grouped.get(k);
    if (bucket) bucket.push(row);
    else grouped.set(k, [row]);
  }
  return grouped;
}

/**
 * Load every user with keywords, excluded words and filter modes.
 * Keyword order follows insertion (id) order.
 */
export async function fetchUsers(): Promise<UserRecord[]> {
  const db = getDb();

  const userRows = await db.select().from(users);
  if (userRows.length === 0) return [];

  const ids = userRows.map((u) => u.uniqueUserId);

  const [keywordRows, excludedRows, modeRows] = await Promise.all([
    db.select().from(keywords).where(inArray(keywords.uniqueUserId, ids)).orderBy(keywords.id),
    db.select().from(excludedWords).where(inArray(excludedWords.uniqueUserId, ids)),
    db.select().from(userModes).where(inArray(userModes.uniqueUserId, ids)),
  ]);

  const keywordsByUser = groupBy(keywordRows, (r) => r.uniqueUserId);
  const excludedByUser = groupBy(excludedRows, (r) => r.uniqueUserId);
  const modesByUser = new Map(modeRows.map((r) => [r.uniqueUserId, r]));

  return userRows.map((u) => {
    const modes = modesByUser.get(u.uniqueUserId);
    return {
      uniqueUserId: u.uniqueUserId,
      chatId: u.chatId,
      activationStatus: u.activationStatus,
      expiryDate: u.expiryDate,
      location: u.location,
      fixedLat: u.fixedLat,
      fixedLon: u.fixedLon,
      keywords: (keywordsByUser.get(u.uniqueUserId) ?? []).map((k) => k.keyword),
      excludedWords: (excludedByUser.get(u.uniqueUserId) ?? []).map((e) => e.excludedWord),
      modes: modes
        ? { modeOnlyPreferred: modes.modeOnlyPreferred, nearGoodDeals: modes.nearGoodDeals, goodDeals: modes.goodDeals }
        : { ...NO_MODES },
    };
  });
}

/**
 * Product catalogue rows for the user behind a chat id.
 */
export async function fetchUserProducts(chatId: number): Promise<UserProductRow[]> {
  const db = getDb();

  return db
    .select({
      id: userProducts.id,
      uniqueUserId: userProducts.uniqueUserId,
      productName: userProducts.productName,
      matchTerms: userProducts.matchTerms,
      preferred: userProducts.preferred,
      goodDealPrice: userProducts.goodDealPrice,
      nearGoodDealPrice: userProducts.nearGoodDealPrice,
    })
    .from(userProducts)
    .innerJoin(users, eq(users.uniqueUserId, userProducts.uniqueUserId))
    .where(eq(users.chatId, chatId))
    .orderBy(userProducts.id);
}

export const dbUserSource: UserSource = { fetchUsers };
