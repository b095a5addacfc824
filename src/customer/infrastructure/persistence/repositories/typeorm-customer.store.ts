import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { QueryFailedError, Repository, SelectQueryBuilder } from 'typeorm';
import {
  CustomerPage,
  CustomerStore,
} from '../../../application/interfaces/customer-store.interface';
import { Customer } from '../../../domain/entities/customer.entity';
import { CustomerEmailConflictException } from '../../../domain/exceptions/customer-email-conflict.exception';
import { CustomerNotFoundException } from '../../../domain/exceptions/customer-not-found.exception';
import {
  CustomerCriterion,
  CustomerFilter,
} from '../../../domain/query/customer-filter';
import {
  CustomerSort,
  CustomerSortField,
  SortDirection,
} from '../../../domain/query/customer-sort';
import { CustomerOrmEntity } from '../entities/customer.orm-entity';
import { CustomerMapper } from '../mappers/customer.mapper';

const SORT_COLUMNS: Record<CustomerSortField, string> = {
  [CustomerSortField.NAME]: 'c.name',
  [CustomerSortField.EMAIL]: 'c.email',
  [CustomerSortField.CREATED_AT]: 'c.createdAt',
};

function escapeLike(term: string): string {
  return term.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

@Injectable()
export class TypeOrmCustomerStore implements CustomerStore {
  private readonly logger = new Logger(TypeOrmCustomerStore.name);

  constructor(
    @InjectRepository(CustomerOrmEntity)
    private readonly repo: Repository<CustomerOrmEntity>,
  ) {}

  async insert(customer: Customer): Promise<Customer> {
    try {
      await this.repo.insert(CustomerMapper.toOrm(customer));
    } catch (error: unknown) {
      throw this.translateWriteError(error, customer);
    }
    return customer;
  }

  async update(customer: Customer): Promise<Customer> {
    const { id, ...changes } = CustomerMapper.toOrm(customer);
    let affected: number | undefined;
    try {
      ({ affected } = await this.repo.update({ id }, changes));
    } catch (error: unknown) {
      throw this.translateWriteError(error, customer);
    }

    if (affected === 0) {
      throw new CustomerNotFoundException(id);
    }
    return customer;
  }

  async findById(id: string, activeOnly: boolean): Promise<Customer | null> {
    const entity = await this.repo.findOne({
      where: activeOnly ? { id, isDeleted: false } : { id },
    });
    return entity ? CustomerMapper.toDomain(entity) : null;
  }

  async findByEmail(
    email: string,
    activeOnly: boolean,
  ): Promise<Customer | null> {
    const entity = await this.repo.findOne({
      where: activeOnly ? { email, isDeleted: false } : { email },
      order: { createdAt: 'DESC' },
    });
    return entity ? CustomerMapper.toDomain(entity) : null;
  }

  async query(
    filter: CustomerFilter,
    sort: CustomerSort,
    skip: number,
    take: number,
  ): Promise<CustomerPage> {
    const qb = this.repo.createQueryBuilder('c');
    filter.forEach((criterion, i) => this.applyCriterion(qb, criterion, i));

    const [entities, totalCount] = await qb
      .orderBy(
        SORT_COLUMNS[sort.field],
        sort.direction === SortDirection.DESC ? 'DESC' : 'ASC',
      )
      .addOrderBy('c.id', 'ASC')
      .offset(skip)
      .limit(take)
      .getManyAndCount();

    this.logger.debug(
      `Query matched ${totalCount} customers, returning ${entities.length}`,
    );
    return {
      items: entities.map((e) => CustomerMapper.toDomain(e)),
      totalCount,
    };
  }

  async count(): Promise<number> {
    return this.repo.count();
  }

  async isHealthy(): Promise<boolean> {
    try {
      await this.repo.query('SELECT 1');
      return true;
    } catch (error) {
      this.logger.error('Customer store health check failed', error);
      return false;
    }
  }

  private applyCriterion(
    qb: SelectQueryBuilder<CustomerOrmEntity>,
    criterion: CustomerCriterion,
    position: number,
  ): void {
    // Parameter names carry the position so repeated kinds cannot collide.
    const param = `p${position}`;
    switch (criterion.kind) {
      case 'active':
        qb.andWhere(`c.isDeleted = :${param}`, { [param]: false });
        return;
      case 'search':
        qb.andWhere(
          `(c.nameSearch LIKE :${param} ESCAPE '\\' OR c.emailSearch LIKE :${param} ESCAPE '\\')`,
          { [param]: `%${escapeLike(criterion.term.toLowerCase())}%` },
        );
        return;
      case 'emailEquals':
        qb.andWhere(`c.email = :${param}`, { [param]: criterion.email });
        return;
      case 'createdFrom':
        qb.andWhere(`c.createdAt >= :${param}`, {
          [param]: criterion.date.toISOString(),
        });
        return;
      case 'createdTo':
        qb.andWhere(`c.createdAt <= :${param}`, {
          [param]: criterion.date.toISOString(),
        });
        return;
    }
  }

  private translateWriteError(error: unknown, customer: Customer): unknown {
    if (
      error instanceof QueryFailedError &&
      /UNIQUE constraint failed: customers\.email/.test(error.message)
    ) {
      this.logger.warn(
        `Unique index rejected email ${customer.email} for customer ${customer.id}`,
      );
      return new CustomerEmailConflictException(customer.email);
    }
    return error;
  }
}
