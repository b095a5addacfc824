import { BulkCreateCustomersUseCase } from '../../src/customer/application/use-cases/bulk-create-customers.use-case';
import { CreateCustomerUseCase } from '../../src/customer/application/use-cases/create-customer.use-case';
import { EmailUniquenessService } from '../../src/customer/application/services/email-uniqueness.service';
import { CustomerGenerator } from '../../src/customer/application/interfaces/customer-generator.interface';
import { CustomerValidationException } from '../../src/customer/domain/exceptions/customer-validation.exception';
import { CustomerDraft } from '../../src/customer/domain/value-objects/customer-details.vo';
import { InMemoryCustomerStore } from '../support/in-memory-customer.store';
import { makeCustomer } from '../support/customer.factory';

describe('BulkCreateCustomersUseCase', () => {
  let store: InMemoryCustomerStore;
  let generator: jest.Mocked<CustomerGenerator>;
  let useCase: BulkCreateCustomersUseCase;

  const draftsFor = (count: number): CustomerDraft[] =>
    Array.from({ length: count }, (_, i) => ({
      name: `Generated ${i}`,
      email: `generated.${i}@example.com`,
      phone: '+1-555-000-0000',
      address: `${i} Main St, Boston, MA 02101, United States`,
    }));

  const build = () =>
    new BulkCreateCustomersUseCase(
      generator,
      new CreateCustomerUseCase(store, new EmailUniquenessService(store)),
    );

  beforeEach(() => {
    store = new InMemoryCustomerStore();
    generator = { generate: jest.fn<CustomerDraft[], [number]>() };
    useCase = build();
  });

  it('should create every candidate when nothing collides', async () => {
    generator.generate.mockReturnValue(draftsFor(3));

    const result = await useCase.execute(3, 'bulk');

    expect(generator.generate).toHaveBeenCalledWith(3);
    expect(result.successCount).toBe(3);
    expect(result.failureCount).toBe(0);
    expect(result.errors).toEqual([]);
    expect(result.createdCustomers.map((c) => c.email)).toEqual([
      'generated.0@example.com',
      'generated.1@example.com',
      'generated.2@example.com',
    ]);
    expect(result.createdCustomers.every((c) => c.createdBy === 'bulk')).toBe(
      true,
    );
    expect(await store.count()).toBe(3);
  });

  it('should isolate a colliding candidate and keep going', async () => {
    await store.insert(makeCustomer({ email: 'generated.2@example.com' }));
    generator.generate.mockReturnValue(draftsFor(5));

    const result = await useCase.execute(5);

    expect(result.successCount).toBe(4);
    expect(result.failureCount).toBe(1);
    expect(result.errors).toEqual([
      {
        index: 2,
        message: "A customer with email 'generated.2@example.com' already exists",
      },
    ]);
    expect(result.createdCustomers.map((c) => c.name)).toEqual([
      'Generated 0',
      'Generated 1',
      'Generated 3',
      'Generated 4',
    ]);
    expect(await store.count()).toBe(5);
  });

  it('should record invalid candidates as per-item errors', async () => {
    const drafts = draftsFor(3);
    drafts[0] = { ...drafts[0], name: '' };
    drafts[2] = { ...drafts[2], email: 'broken' };
    generator.generate.mockReturnValue(drafts);

    const result = await useCase.execute(3);

    expect(result.successCount).toBe(1);
    expect(result.failureCount).toBe(2);
    expect(result.errors).toEqual([
      { index: 0, message: 'Name is required' },
      { index: 2, message: 'Invalid email format' },
    ]);
    expect(result.successCount + result.failureCount).toBe(3);
    expect(result.createdCustomers).toHaveLength(result.successCount);
  });

  it('should not roll back earlier successes when the store fails', async () => {
    generator.generate.mockReturnValue(draftsFor(3));
    const failure = new Error('SQLITE_IOERR: disk I/O error');
    const insert = store.insert.bind(store);
    jest
      .spyOn(store, 'insert')
      .mockImplementationOnce(insert)
      .mockRejectedValueOnce(failure);

    await expect(useCase.execute(3)).rejects.toBe(failure);

    expect(store.all().map((c) => c.email)).toEqual([
      'generated.0@example.com',
    ]);
  });

  it.each([0, 1001, 1.5])('should reject a count of %p', async (count) => {
    await expect(useCase.execute(count)).rejects.toBeInstanceOf(
      CustomerValidationException,
    );
    expect(generator.generate).not.toHaveBeenCalled();
  });

  it('should refuse a generator that returns the wrong number of candidates', async () => {
    generator.generate.mockReturnValue(draftsFor(2));

    await expect(useCase.execute(3)).rejects.toThrow(
      'Customer generator returned 2 candidates, expected 3',
    );
    expect(await store.count()).toBe(0);
  });
});
