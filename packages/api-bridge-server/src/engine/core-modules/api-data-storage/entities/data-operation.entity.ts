import {
  Column,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  type Relation,
} from 'typeorm';

import { StorageSessionEntity } from 'src/engine/core-modules/api-data-storage/entities/storage-session.entity';
import { type DataOperationType } from 'src/engine/core-modules/api-data-storage/types/data-operation-type.type';

@Index('IDX_DATA_OPERATION_SESSION_ID', ['sessionId'])
@Entity({ name: 'dataOperation' })
export class DataOperationEntity {
  @PrimaryGeneratedColumn('increment')
  id!: number;

  @Column({ type: 'varchar', nullable: false })
  sessionId!: string;

  @ManyToOne(() => StorageSessionEntity, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'sessionId' })
  session!: Relation<StorageSessionEntity>;

  @Column({ type: 'varchar', nullable: false })
  operationType!: DataOperationType;

  @Column({ type: 'integer', default: 0 })
  recordsAffected!: number;

  @Column({ type: 'text', nullable: true })
  details!: string | null;

  @Column({ type: 'datetime' })
  createdAt!: Date;
}
