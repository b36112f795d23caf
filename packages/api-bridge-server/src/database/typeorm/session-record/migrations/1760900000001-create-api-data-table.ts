import { type MigrationInterface, type QueryRunner } from 'typeorm';

export class CreateApiDataTable1760900000001 implements MigrationInterface {
  name = 'CreateApiDataTable1760900000001';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      CREATE TABLE "apiData" (
        "id" integer PRIMARY KEY AUTOINCREMENT NOT NULL,
        "contentHash" varchar NOT NULL,
        "rawValue" text NOT NULL,
        "processedValue" text,
        "sourceParams" text,
        "createdAt" datetime NOT NULL,
        CONSTRAINT "UQ_API_DATA_CONTENT_HASH" UNIQUE ("contentHash")
      )
    `);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE "apiData"`);
  }
}
