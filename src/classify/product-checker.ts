import { fetchUserProducts } from '../db/user-repository.js';
import type { ProductCheck, ProductChecker } from '../monitor/types.js';

export interface ProductDefinition {
  productName: string;
  matchTerms: string[];
  preferred: boolean;
  goodDealPrice: number | null;
  nearGoodDealPrice: number | null;
}

export const NO_MATCH: ProductCheck = {
  productName: null,
  preferred: false,
  isGoodDeal: false,
  nearGoodDeal: false,
};

/**
 * First number in a price label: "$1,200" → 1200, "A$49.50" → 49.5, "Free" → null.
 */
export function parsePrice(text: string): number | null {
  const match = /\d+(?:\.\d+)?/.exec(text.replace(/,/g, ''));
  return match ? Number.parseFloat(match[0]) : null;
}

export function matchProduct(products: ProductDefinition[], title: string): ProductDefinition | undefined {
  const lowered = title.toLowerCase();
  return products.find(
    (product) =>
      product.matchTerms.length > 0 && product.matchTerms.every((term) => lowered.includes(term.toLowerCase())),
  );
}

export function classifyListing(products: ProductDefinition[], title: string, priceText: string): ProductCheck {
  const product = matchProduct(products, title);
  if (!product) return { ...NO_MATCH };

  const price = parsePrice(priceText);
  const isGoodDeal = price !== null && product.goodDealPrice !== null && price <= product.goodDealPrice;
  const nearGoodDeal =
    !isGoodDeal && price !== null && product.nearGoodDealPrice !== null && price <= product.nearGoodDealPrice;

  return {
    productName: product.productName,
    preferred: product.preferred,
    isGoodDeal,
    nearGoodDeal,
  };
}

/**
 * Classifies listings against each subscriber's product catalogue.
 */
export class CatalogProductChecker implements ProductChecker {
  constructor(
    private readonly loadProducts: (chatId: number) => Promise<ProductDefinition[]> = fetchUserProducts,
  ) {}

  async checkProduct(chatId: number, title: string, price: string): Promise<ProductCheck> {
    const products = await this.loadProducts(chatId);
    return classifyListing(products, title, price);
  }
}
