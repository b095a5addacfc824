import { Entity, Column, PrimaryColumn, Index } from 'typeorm';

// Uniqueness only binds live rows, so a deleted customer's email can be
// taken again.
@Entity('customers')
@Index('UQ_customers_active_email', ['email'], {
  unique: true,
  where: '"is_deleted" = 0',
})
export class CustomerOrmEntity {
  @PrimaryColumn({ type: 'varchar', length: 36 })
  id!: string;

  @Column({ type: 'varchar', length: 100 })
  name!: string;

  @Column({ type: 'varchar', length: 320 })
  email!: string;

  // Lower-cased copies for search; SQLite's LOWER() and LIKE fold ASCII only.
  @Column({ name: 'name_search', type: 'varchar', default: '' })
  nameSearch!: string;

  @Column({ name: 'email_search', type: 'varchar', default: '' })
  emailSearch!: string;

  @Column({ type: 'varchar', length: 20, nullable: true })
  phone!: string | null;

  @Column({ type: 'varchar', length: 500, nullable: true })
  address!: string | null;

  @Column({ name: 'is_deleted', type: 'boolean', default: false })
  isDeleted!: boolean;

  @Column({ name: 'created_at', type: 'varchar', length: 24 })
  createdAt!: string;

  @Column({ name: 'updated_at', type: 'varchar', length: 24 })
  updatedAt!: string;

  @Column({ name: 'created_by', type: 'varchar', nullable: true })
  createdBy!: string | null;

  @Column({ name: 'updated_by', type: 'varchar', nullable: true })
  updatedBy!: string | null;
}
