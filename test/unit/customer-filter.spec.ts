import {
  buildCustomerFilter,
  matchesCustomerFilter,
} from '../../src/customer/domain/query/customer-filter';
import { makeCustomer } from '../support/customer.factory';

describe('buildCustomerFilter', () => {
  it('should always start by excluding deleted customers', () => {
    expect(buildCustomerFilter()).toEqual([{ kind: 'active' }]);
  });

  it('should add criteria in the fixed order', () => {
    const from = new Date('2026-01-01T00:00:00.000Z');
    const to = new Date('2026-02-01T00:00:00.000Z');

    const filter = buildCustomerFilter({
      dateTo: to,
      dateFrom: from,
      emailFilter: ' john@example.com ',
      searchTerm: '  Smith ',
    });

    expect(filter).toEqual([
      { kind: 'active' },
      { kind: 'search', term: '  Smith ' },
      { kind: 'emailEquals', email: ' john@example.com ' },
      { kind: 'createdFrom', date: from },
      { kind: 'createdTo', date: to },
    ]);
  });

  it('should ignore blank search and email values', () => {
    expect(
      buildCustomerFilter({ searchTerm: '   ', emailFilter: '', dateFrom: null }),
    ).toEqual([{ kind: 'active' }]);
  });
});

describe('matchesCustomerFilter', () => {
  const john = makeCustomer({
    name: 'John Smith',
    email: 'john@example.com',
    createdAt: new Date('2026-01-15T00:00:00.000Z'),
  });

  it('should reject deleted customers', () => {
    const deleted = john.markDeleted(new Date('2026-01-20T00:00:00.000Z'));
    expect(matchesCustomerFilter(deleted, buildCustomerFilter())).toBe(false);
  });

  it('should match the search term case-insensitively in name or email', () => {
    expect(
      matchesCustomerFilter(john, buildCustomerFilter({ searchTerm: 'SMITH' })),
    ).toBe(true);
    expect(
      matchesCustomerFilter(
        john,
        buildCustomerFilter({ searchTerm: 'Example.COM' }),
      ),
    ).toBe(true);
    expect(
      matchesCustomerFilter(john, buildCustomerFilter({ searchTerm: 'jones' })),
    ).toBe(false);
  });

  it('should match the search term with its surrounding spaces', () => {
    const smithson = makeCustomer({
      name: 'Johnny Smithson',
      email: 'johnny@example.com',
    });

    expect(
      matchesCustomerFilter(smithson, buildCustomerFilter({ searchTerm: 'smith ' })),
    ).toBe(false);
    expect(
      matchesCustomerFilter(john, buildCustomerFilter({ searchTerm: 'john smith' })),
    ).toBe(true);
  });

  it('should not trim the email filter before comparing', () => {
    expect(
      matchesCustomerFilter(
        john,
        buildCustomerFilter({ emailFilter: ' john@example.com' }),
      ),
    ).toBe(false);
  });

  it('should match the email filter exactly and case-sensitively', () => {
    expect(
      matchesCustomerFilter(
        john,
        buildCustomerFilter({ emailFilter: 'john@example.com' }),
      ),
    ).toBe(true);
    expect(
      matchesCustomerFilter(
        john,
        buildCustomerFilter({ emailFilter: 'John@example.com' }),
      ),
    ).toBe(false);
    expect(
      matchesCustomerFilter(john, buildCustomerFilter({ emailFilter: 'john' })),
    ).toBe(false);
  });

  it('should treat both date bounds as inclusive', () => {
    const at = new Date('2026-01-15T00:00:00.000Z');
    expect(
      matchesCustomerFilter(
        john,
        buildCustomerFilter({ dateFrom: at, dateTo: at }),
      ),
    ).toBe(true);
    expect(
      matchesCustomerFilter(
        john,
        buildCustomerFilter({ dateFrom: new Date('2026-01-15T00:00:00.001Z') }),
      ),
    ).toBe(false);
    expect(
      matchesCustomerFilter(
        john,
        buildCustomerFilter({ dateTo: new Date('2026-01-14T23:59:59.999Z') }),
      ),
    ).toBe(false);
  });
});
