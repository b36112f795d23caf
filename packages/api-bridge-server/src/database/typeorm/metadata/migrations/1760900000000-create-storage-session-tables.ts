import { type MigrationInterface, type QueryRunner } from 'typeorm';

export class CreateStorageSessionTables1760900000000
  implements MigrationInterface
{
  name = 'CreateStorageSessionTables1760900000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      CREATE TABLE "storageSession" (
        "id" varchar PRIMARY KEY NOT NULL,
        "name" varchar NOT NULL,
        "description" text,
        "apiName" varchar NOT NULL,
        "endpointName" varchar NOT NULL,
        "fileName" varchar NOT NULL,
        "totalRecords" integer NOT NULL DEFAULT (0),
        "createdAt" datetime NOT NULL,
        "updatedAt" datetime NOT NULL,
        "lastOperationAt" datetime
      )
    `);

    await queryRunner.query(`
      CREATE INDEX "IDX_STORAGE_SESSION_CREATED_AT"
      ON "storageSession" ("createdAt")
    `);

    await queryRunner.query(`
      CREATE TABLE "dataOperation" (
        "id" integer PRIMARY KEY AUTOINCREMENT NOT NULL,
        "sessionId" varchar NOT NULL,
        "operationType" varchar NOT NULL,
        "recordsAffected" integer NOT NULL DEFAULT (0),
        "details" text,
        "createdAt" datetime NOT NULL,
        CONSTRAINT "FK_dataOperation_session" FOREIGN KEY ("sessionId")
          REFERENCES "storageSession" ("id") ON DELETE CASCADE
      )
    `);

    await queryRunner.query(`
      CREATE INDEX "IDX_DATA_OPERATION_SESSION_ID"
      ON "dataOperation" ("sessionId")
    `);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP INDEX "IDX_DATA_OPERATION_SESSION_ID"`);
    await queryRunner.query(`DROP TABLE "dataOperation"`);
    await queryRunner.query(`DROP INDEX "IDX_STORAGE_SESSION_CREATED_AT"`);
    await queryRunner.query(`DROP TABLE "storageSession"`);
  }
}
