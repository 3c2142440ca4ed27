import type { ProductCheck } from '../monitor/types.js';

export const GOOD_DEAL_LABEL = '✅ Good Deal @ ';
export const NEAR_GOOD_DEAL_LABEL = '⚠️ Near Good Deal @ ';

export function dealLabel(check: Pick<ProductCheck, 'isGoodDeal' | 'nearGoodDeal'>): string {
  if (check.isGoodDeal) return GOOD_DEAL_LABEL;
  if (check.nearGoodDeal) return NEAR_GOOD_DEAL_LABEL;
  return '';
}

export function provisionalText(label: string, price: string, url: string): string {
  return `${label}For ${price}\nLink: ${url}`;
}

export function enrichedText(label: string, address: string, distance: string, price: string, url: string): string {
  return `${label}${address} (${distance}) For ${price}\nLink: ${url}`;
}

export function fallbackText(label: string, price: string, url: string): string {
  return `${label}Location update failed. For ${price}\nLink: ${url}`;
}
