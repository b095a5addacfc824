import { Customer } from '../../../domain/entities/customer.entity';
import { CustomerOrmEntity } from '../entities/customer.orm-entity';

export class CustomerMapper {
  static toDomain(orm: CustomerOrmEntity): Customer {
    return new Customer({
      id: orm.id,
      name: orm.name,
      email: orm.email,
      phone: orm.phone,
      address: orm.address,
      isDeleted: Boolean(orm.isDeleted),
      createdAt: new Date(orm.createdAt),
      updatedAt: new Date(orm.updatedAt),
      createdBy: orm.createdBy,
      updatedBy: orm.updatedBy,
    });
  }

  // Timestamps are stored as ISO-8601 UTC strings, which sort the same
  // way as the instants they encode.
  static toOrm(domain: Customer): CustomerOrmEntity {
    const orm = new CustomerOrmEntity();
    orm.id = domain.id;
    orm.name = domain.name;
    orm.email = domain.email;
    orm.nameSearch = domain.name.toLowerCase();
    orm.emailSearch = domain.email.toLowerCase();
    orm.phone = domain.phone;
    orm.address = domain.address;
    orm.isDeleted = domain.isDeleted;
    orm.createdAt = domain.createdAt.toISOString();
    orm.updatedAt = domain.updatedAt.toISOString();
    orm.createdBy = domain.createdBy;
    orm.updatedBy = domain.updatedBy;
    return orm;
  }
}
