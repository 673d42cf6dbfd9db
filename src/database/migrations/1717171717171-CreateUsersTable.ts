import { MigrationInterface, QueryRunner } from 'typeorm';

export class CreateUsersTable1717171717171 implements MigrationInterface {
    name = 'CreateUsersTable1717171717171';

    async up(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS "uuid-ossp"`);
        await queryRunner.query(
            `CREATE TYPE "users_role_enum" AS ENUM ('ANONYMOUS', 'AUTHENTICATED', 'MANAGER', 'ADMIN')`,
        );
        await queryRunner.query(`
            CREATE TABLE "users" (
                "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
                "nickname" character varying(50) NOT NULL,
                "email" character varying(255) NOT NULL,
                "first_name" character varying(100),
                "last_name" character varying(100),
                "bio" text,
                "profile_picture_url" character varying(255),
                "linkedin_profile_url" character varying(255),
                "github_profile_url" character varying(255),
                "role" "users_role_enum" NOT NULL DEFAULT 'ANONYMOUS',
                "is_professional" boolean NOT NULL DEFAULT false,
                "professional_status_updated_at" TIMESTAMP WITH TIME ZONE,
                "last_login_at" TIMESTAMP WITH TIME ZONE,
                "failed_login_attempts" integer NOT NULL DEFAULT 0,
                "is_locked" boolean NOT NULL DEFAULT false,
                "hashed_password" character varying(255) NOT NULL,
                "verification_token" character varying(255),
                "email_verified" boolean NOT NULL DEFAULT false,
                "created_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
                "updated_at" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
                CONSTRAINT "UQ_users_nickname" UNIQUE ("nickname"),
                CONSTRAINT "UQ_users_email" UNIQUE ("email"),
                CONSTRAINT "PK_users_id" PRIMARY KEY ("id")
            )
        `);
    }

    async down(queryRunner: QueryRunner): Promise<void> {
        await queryRunner.query(`DROP TABLE "users"`);
        await queryRunner.query(`DROP TYPE "users_role_enum"`);
    }
}
