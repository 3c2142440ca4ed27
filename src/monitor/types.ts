export interface FilterModes {
  modeOnlyPreferred: boolean;
  nearGoodDeals: boolean;
  goodDeals: boolean;
}

/** One subscriber as read from the persistence layer, fresh every cycle. */
export interface UserRecord {
  uniqueUserId: string;
  chatId: number;
  activationStatus: boolean;
  expiryDate: string; // yyyy-MM-dd
  location: string;
  fixedLat: number;
  fixedLon: number;
  keywords: string[];
  excludedWords: string[];
  modes: FilterModes;
}

export interface UserSource {
  fetchUsers(): Promise<UserRecord[]>;
}

export interface SubscriberConfig {
  chatId: number;
  excludedWords: string[];
  fixedLat: number;
  fixedLon: number;
  modes: FilterModes;
}

export interface WorkItem {
  keyword: string;
  location: string;
}

export type NextStatus = 'active' | 'inactive';

export interface LocationStatus {
  isActive: boolean;
  reason: string;
  nextChange: Date;
  nextStatus: NextStatus;
}

/** A search-result card; any field may be missing on malformed markup. */
export interface ListingRecord {
  link: string | null;
  price: string | null;
  title: string | null;
}

export interface CompleteListing {
  link: string;
  price: string;
  title: string;
}

export interface ProductCheck {
  productName: string | null;
  preferred: boolean;
  isGoodDeal: boolean;
  nearGoodDeal: boolean;
}

export interface ProductChecker {
  checkProduct(chatId: number, title: string, price: string): Promise<ProductCheck>;
}

export interface SentMessage {
  messageId: number;
}

export interface Messenger {
  sendMessage(text: string, chatId: number): Promise<SentMessage | null>;
  editMessage(chatId: number, messageId: number, text: string): Promise<boolean>;
}

export interface ListingSource {
  searchListings(keyword: string, location: string): Promise<ListingRecord[]>;
  fetchListingDetail(link: string): Promise<string>;
  absoluteLink(link: string): string;
}

export interface Geocoder {
  reverseGeocode(lat: number, lon: number): Promise<string>;
  calculateDistance(lat1: number | null, lon1: number | null, lat2: number | null, lon2: number | null): string;
}
