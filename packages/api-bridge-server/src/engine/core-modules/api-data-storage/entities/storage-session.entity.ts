import { Column, Entity, Index, PrimaryColumn } from 'typeorm';

@Index('IDX_STORAGE_SESSION_CREATED_AT', ['createdAt'])
@Entity({ name: 'storageSession' })
export class StorageSessionEntity {
  @PrimaryColumn({ type: 'varchar' })
  id!: string;

  @Column({ type: 'varchar', nullable: false })
  name!: string;

  @Column({ type: 'text', nullable: true })
  description!: string | null;

  @Column({ type: 'varchar', nullable: false })
  apiName!: string;

  @Column({ type: 'varchar', nullable: false })
  endpointName!: string;

  // Record database of the session, relative to the storage directory.
  @Column({ type: 'varchar', nullable: false })
  fileName!: string;

  @Column({ type: 'integer', default: 0 })
  totalRecords!: number;

  @Column({ type: 'datetime' })
  createdAt!: Date;

  @Column({ type: 'datetime' })
  updatedAt!: Date;

  @Column({ type: 'datetime', nullable: true })
  lastOperationAt!: Date | null;
}
