import { Column, Entity, PrimaryGeneratedColumn, Unique } from 'typeorm';

// Lives in the per-session record database, not in the metadata database.
@Unique('UQ_API_DATA_CONTENT_HASH', ['contentHash'])
@Entity({ name: 'apiData' })
export class ApiDataRecordEntity {
  @PrimaryGeneratedColumn('increment')
  id!: number;

  @Column({ type: 'varchar', nullable: false })
  contentHash!: string;

  // JSON text
  @Column({ type: 'text', nullable: false })
  rawValue!: string;

  @Column({ type: 'text', nullable: true })
  processedValue!: string | null;

  @Column({ type: 'text', nullable: true })
  sourceParams!: string | null;

  @Column({ type: 'datetime' })
  createdAt!: Date;
}
