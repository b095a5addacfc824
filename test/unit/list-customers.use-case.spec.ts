import { ListCustomersUseCase } from '../../src/customer/application/use-cases/list-customers.use-case';
import { CustomerValidationException } from '../../src/customer/domain/exceptions/customer-validation.exception';
import { Customer } from '../../src/customer/domain/entities/customer.entity';
import { loadAppConfig } from '../../src/shared/config/app.config';
import { InMemoryCustomerStore } from '../support/in-memory-customer.store';
import { makeCustomer } from '../support/customer.factory';

const NAMES = [
  'John Smith',
  'Anna Smithers',
  'Kate Gold',
  'Mary Jones',
  'Peter Brown',
  'Linda Green',
  'Paul White',
  'Susan Black',
  'Mark Taylor',
  'Laura Moore',
  'David Hall',
  'Nancy King',
  'Brian Scott',
  'Carol Adams',
  'Kevin Baker',
];

const dayOf = (n: number): Date =>
  new Date(Date.UTC(2026, 0, 1 + n, 0, 0, 0, 0));

describe('ListCustomersUseCase', () => {
  let store: InMemoryCustomerStore;
  let useCase: ListCustomersUseCase;
  let customers: Customer[];

  beforeEach(() => {
    // Day n holds NAMES[n]; "Kate Gold" is a smith through her email only.
    customers = NAMES.map((name, n) =>
      makeCustomer({
        name,
        email:
          name === 'Kate Gold'
            ? 'k.goldsmith@example.com'
            : `${name.toLowerCase().replace(' ', '.')}@example.com`,
        createdAt: dayOf(n),
      }),
    );
    const deletedSmith = makeCustomer({
      name: 'Old Smith',
      email: 'old.smith@example.com',
      createdAt: dayOf(20),
      isDeleted: true,
    });

    store = new InMemoryCustomerStore([...customers, deletedSmith]);
    useCase = new ListCustomersUseCase(store, loadAppConfig({}));
  });

  it('should count every match before paginating', async () => {
    const page = await useCase.execute({ skip: 0, take: 10, searchTerm: 'smith' });

    expect(page.totalCount).toBe(3);
    expect(page.items.map((c) => c.name)).toEqual([
      'Kate Gold',
      'Anna Smithers',
      'John Smith',
    ]);
  });

  it('should report the same total regardless of the window', async () => {
    const first = await useCase.execute({ skip: 0, take: 2, searchTerm: 'SMITH' });
    const second = await useCase.execute({ skip: 2, take: 2, searchTerm: 'SMITH' });
    const beyond = await useCase.execute({ skip: 50, take: 2, searchTerm: 'SMITH' });

    expect(first.totalCount).toBe(3);
    expect(second.totalCount).toBe(3);
    expect(beyond.totalCount).toBe(3);
    expect(first.items).toHaveLength(2);
    expect(second.items).toHaveLength(1);
    expect(beyond.items).toEqual([]);
  });

  it('should never return deleted customers', async () => {
    const page = await useCase.execute({ skip: 0, take: 100 });

    expect(page.totalCount).toBe(15);
    expect(page.items.some((c) => c.isDeleted)).toBe(false);
  });

  it('should order newest first when no sort is requested', async () => {
    const page = await useCase.execute({ skip: 0, take: 3 });

    expect(page.items.map((c) => c.name)).toEqual([
      'Kevin Baker',
      'Carol Adams',
      'Brian Scott',
    ]);
  });

  it('should fall back to newest first for an unknown sort key', async () => {
    const page = await useCase.execute({
      skip: 0,
      take: 1,
      sortBy: 'phone',
      sortOrder: 'asc',
    });

    expect(page.items[0].name).toBe('Kevin Baker');
  });

  it('should sort by name ascending', async () => {
    const page = await useCase.execute({
      skip: 0,
      take: 3,
      sortBy: 'name',
      sortOrder: 'asc',
    });

    expect(page.items.map((c) => c.name)).toEqual([
      'Anna Smithers',
      'Brian Scott',
      'Carol Adams',
    ]);
  });

  it('should apply the exact email filter', async () => {
    const page = await useCase.execute({
      skip: 0,
      take: 10,
      emailFilter: 'john.smith@example.com',
    });

    expect(page.totalCount).toBe(1);
    expect(page.items[0].name).toBe('John Smith');
  });

  it('should combine the date range with the search term', async () => {
    const page = await useCase.execute({
      skip: 0,
      take: 10,
      searchTerm: 'smith',
      dateFrom: dayOf(1),
      dateTo: dayOf(14),
    });

    expect(page.totalCount).toBe(2);
    expect(page.items.map((c) => c.name)).toEqual(['Kate Gold', 'Anna Smithers']);
  });

  it('should clamp a negative skip to zero', async () => {
    const page = await useCase.execute({ skip: -5, take: 1 });

    expect(page.items[0].name).toBe('Kevin Baker');
  });

  it.each([1e22, Number.MAX_SAFE_INTEGER + 1, NaN, Infinity])(
    'should reject an offset of %p',
    async (skip) => {
      await expect(useCase.execute({ skip, take: 10 })).rejects.toThrow(
        `Offset must be between 0 and ${Number.MAX_SAFE_INTEGER}`,
      );
    },
  );

  it('should reject date bounds that are not valid instants', async () => {
    const invalid = new Date('2026-W01');

    await expect(
      useCase.execute({ skip: 0, take: 10, dateFrom: invalid, dateTo: invalid }),
    ).rejects.toThrow('dateFrom is not a valid date; dateTo is not a valid date');
  });

  it('should honour a configured page size above the default', async () => {
    const wide = new ListCustomersUseCase(
      store,
      loadAppConfig({ MAX_PAGE_SIZE: '200' }),
    );

    const page = await wide.execute({ skip: 0, take: 150 });

    expect(page.items).toHaveLength(15);
  });

  it.each([0, -1, 101, 2.5])('should reject a page size of %p', async (take) => {
    await expect(useCase.execute({ skip: 0, take })).rejects.toBeInstanceOf(
      CustomerValidationException,
    );
  });
});
