import { MigrationInterface, QueryRunner } from 'typeorm';

export class InitialSchema1730000000001 implements MigrationInterface {
  name = 'InitialSchema1730000000001';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      CREATE TABLE "users" (
        "id" uuid NOT NULL DEFAULT gen_random_uuid(),
        "username" varchar(50) NOT NULL,
        "mobile_no" varchar(15) NOT NULL,
        "password_hash" varchar NOT NULL,
        "created_at" TIMESTAMP NOT NULL DEFAULT now(),
        "updated_at" TIMESTAMP NOT NULL DEFAULT now(),
        "last_login_at" TIMESTAMP,
        CONSTRAINT "PK_users" PRIMARY KEY ("id")
      )
    `);

    await queryRunner.query(`
      CREATE TABLE "sessions" (
        "id" uuid NOT NULL DEFAULT gen_random_uuid(),
        "user_id" uuid NOT NULL,
        "token_hash" varchar(64) NOT NULL,
        "user_agent" varchar,
        "ip_address" varchar(45),
        "created_at" TIMESTAMP NOT NULL DEFAULT now(),
        "expires_at" TIMESTAMP NOT NULL,
        CONSTRAINT "PK_sessions" PRIMARY KEY ("id"),
        CONSTRAINT "FK_sessions_users" FOREIGN KEY ("user_id")
          REFERENCES "users"("id") ON DELETE CASCADE
      )
    `);

    await queryRunner.query(`
      CREATE TABLE "predictions" (
        "id" uuid NOT NULL DEFAULT gen_random_uuid(),
        "user_id" uuid NOT NULL,
        "mobile_no" varchar(15) NOT NULL,
        "score" double precision NOT NULL,
        "category" varchar(20) NOT NULL,
        "recommendations" jsonb NOT NULL DEFAULT '[]',
        "created_at" TIMESTAMP NOT NULL DEFAULT now(),
        CONSTRAINT "PK_predictions" PRIMARY KEY ("id")
      )
    `);

    await queryRunner.query(`
      CREATE TABLE "jewelry_images" (
        "id" SERIAL NOT NULL,
        "name" varchar(255) NOT NULL,
        "url" text NOT NULL,
        CONSTRAINT "PK_jewelry_images" PRIMARY KEY ("id")
      )
    `);

    await queryRunner.query(`CREATE UNIQUE INDEX "idx_users_username" ON "users"("username")`);
    await queryRunner.query(`CREATE UNIQUE INDEX "idx_users_mobile_no" ON "users"("mobile_no")`);
    await queryRunner.query(`CREATE INDEX "idx_sessions_user_id" ON "sessions"("user_id")`);
    await queryRunner.query(`CREATE INDEX "idx_sessions_expires_at" ON "sessions"("expires_at")`);
    await queryRunner.query(
      `CREATE UNIQUE INDEX "idx_sessions_token_hash" ON "sessions"("token_hash")`,
    );
    await queryRunner.query(
      `CREATE INDEX "idx_predictions_user_created" ON "predictions"("user_id", "created_at")`,
    );
    await queryRunner.query(
      `CREATE UNIQUE INDEX "idx_jewelry_images_name" ON "jewelry_images"("name")`,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP INDEX "idx_jewelry_images_name"`);
    await queryRunner.query(`DROP INDEX "idx_predictions_user_created"`);
    await queryRunner.query(`DROP INDEX "idx_sessions_token_hash"`);
    await queryRunner.query(`DROP INDEX "idx_sessions_expires_at"`);
    await queryRunner.query(`DROP INDEX "idx_sessions_user_id"`);
    await queryRunner.query(`DROP INDEX "idx_users_mobile_no"`);
    await queryRunner.query(`DROP INDEX "idx_users_username"`);

    await queryRunner.query(`DROP TABLE "jewelry_images"`);
    await queryRunner.query(`DROP TABLE "predictions"`);
    await queryRunner.query(`DROP TABLE "sessions"`);
    await queryRunner.query(`DROP TABLE "users"`);
  }
}
