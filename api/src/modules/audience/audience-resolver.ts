export type AudienceFilter = {
  tier?: string;
  city?: string;
  state?: string;
  tags?: string[];
  subscription: 'subscribed';
};

/**
 * Source of campaign recipients. Implementations return phones in a stable order with
 * duplicates removed; an empty list is a valid answer.
 */
export interface AudienceResolver {
  resolve(filter: AudienceFilter): Promise<string[]>;
  /** Whether the phone still accepts campaign messages; checked again right before each send. */
  isSubscribed(phone: string): Promise<boolean>;
}

export const AUDIENCE_RESOLVER = Symbol('AUDIENCE_RESOLVER');

/** Keeps the first occurrence of each phone, preserving order. */
export function dedupePhones(phones: readonly string[]): string[] {
  const seen = new Set<string>();
  const unique: string[] = [];

  for (const phone of phones) {
    if (seen.has(phone)) {
      continue;
    }
    seen.add(phone);
    unique.push(phone);
  }

  return unique;
}
