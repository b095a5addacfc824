import { Customer } from '../entities/customer.entity';

export type CustomerCriterion =
  | { kind: 'active' }
  | { kind: 'search'; term: string }
  | { kind: 'emailEquals'; email: string }
  | { kind: 'createdFrom'; date: Date }
  | { kind: 'createdTo'; date: Date };

/**
 * Conjunction of criteria, in the order they are applied. The first entry
 * is always `active`, so every later criterion only sees live records.
 */
export type CustomerFilter = readonly CustomerCriterion[];

export interface CustomerFilterParams {
  searchTerm?: string | null;
  emailFilter?: string | null;
  dateFrom?: Date | null;
  dateTo?: Date | null;
}

// Blankness only gates a criterion; the value itself is matched as given.
function nonBlank(value: string | null | undefined): string | null {
  return value == null || value.trim() === '' ? null : value;
}

export function buildCustomerFilter(
  params: CustomerFilterParams = {},
): CustomerFilter {
  const criteria: CustomerCriterion[] = [{ kind: 'active' }];

  const term = nonBlank(params.searchTerm);
  if (term !== null) {
    criteria.push({ kind: 'search', term });
  }

  const email = nonBlank(params.emailFilter);
  if (email !== null) {
    criteria.push({ kind: 'emailEquals', email });
  }

  if (params.dateFrom) {
    criteria.push({ kind: 'createdFrom', date: params.dateFrom });
  }

  if (params.dateTo) {
    criteria.push({ kind: 'createdTo', date: params.dateTo });
  }

  return criteria;
}

export function matchesCriterion(
  customer: Customer,
  criterion: CustomerCriterion,
): boolean {
  switch (criterion.kind) {
    case 'active':
      return !customer.isDeleted;
    case 'search': {
      const term = criterion.term.toLowerCase();
      return (
        customer.name.toLowerCase().includes(term) ||
        customer.email.toLowerCase().includes(term)
      );
    }
    case 'emailEquals':
      return customer.email === criterion.email;
    case 'createdFrom':
      return customer.createdAt.getTime() >= criterion.date.getTime();
    case 'createdTo':
      return customer.createdAt.getTime() <= criterion.date.getTime();
  }
}

export function matchesCustomerFilter(
  customer: Customer,
  filter: CustomerFilter,
): boolean {
  return filter.every((criterion) => matchesCriterion(customer, criterion));
}
