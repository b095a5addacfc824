import {
  CustomerSortField,
  DEFAULT_CUSTOMER_SORT,
  SortDirection,
  compareCustomers,
  resolveCustomerSort,
} from '../../src/customer/domain/query/customer-sort';
import { makeCustomer } from '../support/customer.factory';

describe('resolveCustomerSort', () => {
  it('should default to newest first when both key and order are blank', () => {
    expect(resolveCustomerSort()).toEqual(DEFAULT_CUSTOMER_SORT);
    expect(resolveCustomerSort('', '  ')).toEqual({
      field: CustomerSortField.CREATED_AT,
      direction: SortDirection.DESC,
    });
  });

  it('should match known keys case-insensitively', () => {
    expect(resolveCustomerSort('NAME', 'asc')).toEqual({
      field: CustomerSortField.NAME,
      direction: SortDirection.ASC,
    });
    expect(resolveCustomerSort('Email', 'DESC')).toEqual({
      field: CustomerSortField.EMAIL,
      direction: SortDirection.DESC,
    });
    expect(resolveCustomerSort('createdat', 'asc')).toEqual({
      field: CustomerSortField.CREATED_AT,
      direction: SortDirection.ASC,
    });
  });

  it('should sort ascending unless the order reads desc', () => {
    expect(resolveCustomerSort('name').direction).toBe(SortDirection.ASC);
    expect(resolveCustomerSort('name', 'sideways').direction).toBe(
      SortDirection.ASC,
    );
  });

  it('should fall back to createdAt descending for an unknown key', () => {
    expect(resolveCustomerSort('phone', 'asc')).toEqual(DEFAULT_CUSTOMER_SORT);
    expect(resolveCustomerSort('phone')).toEqual(DEFAULT_CUSTOMER_SORT);
  });

  it('should use createdAt in the requested direction when only the order is given', () => {
    expect(resolveCustomerSort(undefined, 'asc')).toEqual({
      field: CustomerSortField.CREATED_AT,
      direction: SortDirection.ASC,
    });
  });
});

describe('compareCustomers', () => {
  it('should order by the field and break ties by id', () => {
    const b = makeCustomer({ id: 'b', name: 'Smith' });
    const a = makeCustomer({ id: 'a', name: 'Smith' });
    const c = makeCustomer({ id: 'c', name: 'Adams' });

    const asc = [b, a, c].sort(
      compareCustomers({
        field: CustomerSortField.NAME,
        direction: SortDirection.ASC,
      }),
    );
    expect(asc.map((x) => x.id)).toEqual(['c', 'a', 'b']);

    const desc = [b, a, c].sort(
      compareCustomers({
        field: CustomerSortField.NAME,
        direction: SortDirection.DESC,
      }),
    );
    expect(desc.map((x) => x.id)).toEqual(['a', 'b', 'c']);
  });

  it('should order by creation time', () => {
    const older = makeCustomer({
      id: 'older',
      createdAt: new Date('2026-01-01T00:00:00.000Z'),
    });
    const newer = makeCustomer({
      id: 'newer',
      createdAt: new Date('2026-01-02T00:00:00.000Z'),
    });

    expect(
      [older, newer].sort(compareCustomers(DEFAULT_CUSTOMER_SORT)).map((x) => x.id),
    ).toEqual(['newer', 'older']);
  });
});
