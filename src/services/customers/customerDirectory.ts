import Fuse from 'fuse.js';
import type { Customer, CustomerId } from '../../domain/contracts';

export const defaultCustomers: Customer[] = [
  { customerId: 'CUST-0001', legalName: 'Northwind Textiles Private Limited' },
  { customerId: 'CUST-0002', legalName: 'Harbourline Exports Private Limited' },
  { customerId: 'CUST-0003', legalName: 'Kestrel Agro Foods LLP' },
  { customerId: 'CUST-0004', legalName: 'Bluefin Logistics Limited' },
];

export interface CustomerMatch {
  customer: Customer;
  confidence: number;
}

/** Id-to-name lookup for the customer picker, with fuzzy search over both fields. */
export class CustomerDirectory {
  private readonly byId: Map<CustomerId, Customer>;
  private readonly fuse: Fuse<Customer>;

  constructor(private readonly customers: Customer[] = defaultCustomers) {
    this.byId = new Map(customers.map((customer) => [customer.customerId, customer]));
    this.fuse = new Fuse(customers, {
      keys: ['customerId', 'legalName'],
      includeScore: true,
      threshold: 0.4,
    });
  }

  ids(): CustomerId[] {
    return this.customers.map((customer) => customer.customerId);
  }

  has(customerId: CustomerId): boolean {
    return this.byId.has(customerId);
  }

  displayName(customerId: CustomerId): string {
    return this.byId.get(customerId)?.legalName ?? customerId;
  }

  search(query: string, limit = 10): CustomerMatch[] {
    const trimmed = query.trim();
    if (!trimmed) {
      return this.customers.slice(0, limit).map((customer) => ({ customer, confidence: 1 }));
    }
    return this.fuse.search(trimmed, { limit }).map((result) => ({
      customer: result.item,
      // Fuse scores 0 for a perfect match.
      confidence: 1 - (result.score ?? 0),
    }));
  }
}
