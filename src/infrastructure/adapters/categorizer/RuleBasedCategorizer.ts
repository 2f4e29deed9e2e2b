import type { CategoryLabelDTO } from '../../../application/dto/CategoryLabelDTO.js';
import type { CategorizerPort } from '../../../application/ports/CategorizerPort.js';
import { FALLBACK_CATEGORY } from '../../../domain/entities/Categories.js';
import { normalizeDescription } from '../../../domain/services/DescriptionNormalizer.js';

interface Rule {
  test: (input: string) => boolean;
  category: string;
  subcategory?: string;
}

const rules: Rule[] = [
  // Subscriptions
  { test: (desc) => /\b(netflix|disney|hbo|youtube premium|prime video)\b/.test(desc), category: 'Subscriptions & Digital', subcategory: 'Streaming' },
  { test: (desc) => /\b(spotify|apple music|joox)\b/.test(desc), category: 'Subscriptions & Digital', subcategory: 'Music' },
  { test: (desc) => /\b(steam|playstation|xbox|nintendo)\b/.test(desc), category: 'Subscriptions & Digital', subcategory: 'Games' },
  { test: (desc) => /\b(google|icloud|dropbox|adobe|microsoft|openai)\b/.test(desc), category: 'Subscriptions & Digital', subcategory: 'Cloud & Software' },

  // Convenience stores
  { test: (desc) => /\b(7 ?11|7 eleven|seven eleven)\b/.test(desc), category: 'Convenience Stores', subcategory: '7-Eleven' },
  { test: (desc) => /\b(familymart|family mart)\b/.test(desc), category: 'Convenience Stores', subcategory: 'FamilyMart' },
  { test: (desc) => /\blawson\b/.test(desc), category: 'Convenience Stores', subcategory: 'Lawson' },

  // Online shopping
  // Cafe Amazon is a coffee chain, not the online store.
  { test: (desc) => /\bcafe amazon\b/.test(desc), category: 'Food & Drinks', subcategory: 'Cafes' },
  { test: (desc) => /\bamazon\b/.test(desc), category: 'Online Shopping', subcategory: 'Amazon' },
  { test: (desc) => /\bshopee\b/.test(desc), category: 'Online Shopping', subcategory: 'Shopee' },
  { test: (desc) => /\blazada\b/.test(desc), category: 'Online Shopping', subcategory: 'Lazada' },

  // Supermarkets
  { test: (desc) => /\blotus\b/.test(desc), category: 'Supermarkets', subcategory: 'Lotus' },
  { test: (desc) => /\bbig c\b/.test(desc), category: 'Supermarkets', subcategory: 'Big C' },
  { test: (desc) => /\btops\b/.test(desc), category: 'Supermarkets', subcategory: 'Tops' },
  { test: (desc) => /\bmakro\b/.test(desc), category: 'Supermarkets', subcategory: 'Makro' },

  // Transport
  { test: (desc) => /\b(expressway|tollway|easy pass|m pass)\b/.test(desc), category: 'Tolls & Transport', subcategory: 'Tolls' },
  { test: (desc) => /\b(grab|bolt|taxi|uber|lineman taxi)\b/.test(desc), category: 'Tolls & Transport', subcategory: 'Taxi & Ride Hailing' },
  { test: (desc) => /\b(bts|mrt|airport rail|railway)\b/.test(desc), category: 'Tolls & Transport', subcategory: 'Rail' },
  { test: (desc) => /\b(ptt|shell|bangchak|esso|caltex|petrol|fuel)\b/.test(desc), category: 'Tolls & Transport', subcategory: 'Fuel' },

  // Food
  { test: (desc) => /\b(grabfood|foodpanda|lineman|robinhood|delivery)\b/.test(desc), category: 'Food & Drinks', subcategory: 'Food Delivery' },
  { test: (desc) => /\b(coffee|cafe|starbucks|espresso)\b/.test(desc), category: 'Food & Drinks', subcategory: 'Cafes' },
  { test: (desc) => /\b(restaurant|sushi|shabu|bistro|kitchen|grill)\b/.test(desc), category: 'Food & Drinks', subcategory: 'Restaurants' },

  // Phone & internet
  { test: (desc) => /\b(ais|true move|dtac|mobile)\b/.test(desc), category: 'Phone & Internet', subcategory: 'Mobile' },
  { test: (desc) => /\b(3bb|fiber|broadband)\b/.test(desc), category: 'Phone & Internet', subcategory: 'Fiber' },

  // Travel
  { test: (desc) => /\b(hotel|resort|agoda|booking com|airbnb)\b/.test(desc), category: 'Travel', subcategory: 'Hotels' },
  { test: (desc) => /\b(airways|airlines|air asia|airasia|nok air)\b/.test(desc), category: 'Travel', subcategory: 'Flights' },
  { test: (desc) => /\b(car rental|rent a car|hertz|avis)\b/.test(desc), category: 'Travel', subcategory: 'Car Rental' },

  // Car services
  { test: (desc) => /\b(tyre|tire|brake|b quik|cockpit)\b/.test(desc), category: 'Car Services', subcategory: 'Tyres & Brakes' },
  { test: (desc) => /\b(car wash|carwash)\b/.test(desc), category: 'Car Services', subcategory: 'Car Wash' },

  // Health
  { test: (desc) => /\b(hospital|bumrungrad|bangkok hospital)\b/.test(desc), category: 'Health', subcategory: 'Hospital' },
  { test: (desc) => /\bclinic\b/.test(desc), category: 'Health', subcategory: 'Clinic' },
  { test: (desc) => /\b(pharmacy|boots|watsons)\b/.test(desc), category: 'Health', subcategory: 'Pharmacy' },
  { test: (desc) => /\b(dental|dentist)\b/.test(desc), category: 'Health', subcategory: 'Dental' },

  // Insurance
  { test: (desc) => /\b(insurance|assurance|life insurance)\b/.test(desc), category: 'Insurance' },

  // Shopping
  { test: (desc) => /\b(uniqlo|zara|h m|clothing)\b/.test(desc), category: 'Shopping', subcategory: 'Clothing' },
  { test: (desc) => /\b(central|robinson|emporium|siam paragon)\b/.test(desc), category: 'Shopping', subcategory: 'Department Store' },
  { test: (desc) => /\b(power buy|banana it|electronics)\b/.test(desc), category: 'Shopping', subcategory: 'Electronics' },
  { test: (desc) => /\b(ikea|homepro|index living)\b/.test(desc), category: 'Shopping', subcategory: 'Household' },
];

export class RuleBasedCategorizer implements CategorizerPort {
  async label(descriptions: string[]): Promise<CategoryLabelDTO[]> {
    return descriptions.map((description) => {
      const normalized = normalizeDescription(description);
      const rule = rules.find((candidate) => candidate.test(normalized));

      return rule
        ? { category: rule.category, subcategory: rule.subcategory ?? null }
        : { category: FALLBACK_CATEGORY, subcategory: null };
    });
  }
}
