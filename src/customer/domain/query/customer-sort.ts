import { Customer } from '../entities/customer.entity';

export enum CustomerSortField {
  NAME = 'name',
  EMAIL = 'email',
  CREATED_AT = 'createdAt',
}

export enum SortDirection {
  ASC = 'asc',
  DESC = 'desc',
}

export interface CustomerSort {
  field: CustomerSortField;
  direction: SortDirection;
}

export const DEFAULT_CUSTOMER_SORT: CustomerSort = {
  field: CustomerSortField.CREATED_AT,
  direction: SortDirection.DESC,
};

const FIELDS_BY_KEY = new Map<string, CustomerSortField>([
  ['name', CustomerSortField.NAME],
  ['email', CustomerSortField.EMAIL],
  ['createdat', CustomerSortField.CREATED_AT],
]);

function isBlank(value: string | null | undefined): boolean {
  return (value?.trim() ?? '') === '';
}

/**
 * Maps the requested key and order to an ordering.
 *
 * - both blank: newest first
 * - blank key: `createdAt` in the requested direction
 * - unrecognised key: newest first, whatever the requested direction
 * - direction is descending only when the order reads "desc"
 */
export function resolveCustomerSort(
  sortBy?: string | null,
  sortOrder?: string | null,
): CustomerSort {
  if (isBlank(sortBy) && isBlank(sortOrder)) {
    return DEFAULT_CUSTOMER_SORT;
  }

  const key = sortBy?.trim().toLowerCase() || 'createdat';
  const field = FIELDS_BY_KEY.get(key);
  if (field === undefined) {
    return DEFAULT_CUSTOMER_SORT;
  }

  const direction =
    sortOrder?.trim().toLowerCase() === 'desc'
      ? SortDirection.DESC
      : SortDirection.ASC;

  return { field, direction };
}

function compareValues(a: string | number, b: string | number): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function sortValue(
  customer: Customer,
  field: CustomerSortField,
): string | number {
  switch (field) {
    case CustomerSortField.NAME:
      return customer.name;
    case CustomerSortField.EMAIL:
      return customer.email;
    case CustomerSortField.CREATED_AT:
      return customer.createdAt.getTime();
  }
}

/** Comparator for `sort`, ties broken by ascending id. */
export function compareCustomers(
  sort: CustomerSort,
): (a: Customer, b: Customer) => number {
  const sign = sort.direction === SortDirection.DESC ? -1 : 1;
  return (a, b) =>
    sign * compareValues(sortValue(a, sort.field), sortValue(b, sort.field)) ||
    compareValues(a.id, b.id);
}
