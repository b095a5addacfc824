import { randomUUID } from 'crypto';
import { CustomerDetails } from '../value-objects/customer-details.vo';

export interface CustomerProps {
  id: string;
  name: string;
  email: string;
  phone?: string | null;
  address?: string | null;
  isDeleted?: boolean;
  createdAt: Date;
  updatedAt: Date;
  createdBy?: string | null;
  updatedBy?: string | null;
}

/**
 * Immutable customer record. Mutations return a new instance; the store
 * decides whether it gets persisted.
 */
export class Customer {
  readonly id: string;
  readonly name: string;
  readonly email: string;
  readonly phone: string | null;
  readonly address: string | null;
  readonly isDeleted: boolean;
  readonly createdAt: Date;
  readonly updatedAt: Date;
  readonly createdBy: string | null;
  readonly updatedBy: string | null;

  constructor(params: CustomerProps) {
    this.id = params.id;
    this.name = params.name;
    this.email = params.email;
    this.phone = params.phone ?? null;
    this.address = params.address ?? null;
    this.isDeleted = params.isDeleted ?? false;
    this.createdAt = params.createdAt;
    this.updatedAt =
      params.updatedAt < params.createdAt ? params.createdAt : params.updatedAt;
    this.createdBy = params.createdBy ?? null;
    this.updatedBy = params.updatedBy ?? null;
  }

  static create(
    details: CustomerDetails,
    now: Date,
    actor: string | null = null,
  ): Customer {
    return new Customer({
      id: randomUUID(),
      name: details.name,
      email: details.email,
      phone: details.phone,
      address: details.address,
      createdAt: now,
      updatedAt: now,
      createdBy: actor,
      updatedBy: actor,
    });
  }

  withDetails(
    details: CustomerDetails,
    now: Date,
    actor: string | null = null,
  ): Customer {
    return new Customer({
      ...this.toProps(),
      name: details.name,
      email: details.email,
      phone: details.phone,
      address: details.address,
      updatedAt: now,
      updatedBy: actor ?? this.updatedBy,
    });
  }

  // There is no way back from here; deleted rows stay in storage.
  markDeleted(now: Date, actor: string | null = null): Customer {
    return new Customer({
      ...this.toProps(),
      isDeleted: true,
      updatedAt: now,
      updatedBy: actor ?? this.updatedBy,
    });
  }

  toProps(): CustomerProps {
    return {
      id: this.id,
      name: this.name,
      email: this.email,
      phone: this.phone,
      address: this.address,
      isDeleted: this.isDeleted,
      createdAt: this.createdAt,
      updatedAt: this.updatedAt,
      createdBy: this.createdBy,
      updatedBy: this.updatedBy,
    };
  }
}
