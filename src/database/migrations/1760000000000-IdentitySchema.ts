import { MigrationInterface, QueryRunner } from 'typeorm';

/**
 * 身份与权限核心表结构
 *
 * - users / roles / permissions / role_permissions: 多租户 RBAC
 * - refresh_tokens: 不透明刷新令牌 (只存 SHA-256 摘要)
 * - audit_logs: 只追加的审计记录
 *
 * 注意：类名中的时间戳是迁移系统的标识符，请勿修改
 */
export class IdentitySchema1760000000000 implements MigrationInterface {
  name = 'IdentitySchema1760000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    // 确保 uuid-ossp 扩展已启用（用于生成 UUID）
    await queryRunner.query(`CREATE EXTENSION IF NOT EXISTS "uuid-ossp"`);

    await queryRunner.query(`
      CREATE TABLE "users" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "createdAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
        "updatedAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
        "org_id" character varying NOT NULL,
        "full_name" character varying NOT NULL,
        "email" character varying,
        "phone" character varying,
        "password_hash" character varying,
        "status" character varying(16) NOT NULL DEFAULT 'active',
        "role_ids" text array NOT NULL DEFAULT '{}',
        "role_codes" text array NOT NULL DEFAULT '{}',
        CONSTRAINT "PK_users" PRIMARY KEY ("id")
      )
    `);
    await queryRunner.query(`CREATE UNIQUE INDEX "UQ_users_org_email" ON "users" ("org_id", "email")`);
    await queryRunner.query(`CREATE UNIQUE INDEX "UQ_users_org_phone" ON "users" ("org_id", "phone")`);

    await queryRunner.query(`
      CREATE TABLE "roles" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "createdAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
        "updatedAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
        "org_id" character varying NOT NULL,
        "name" character varying NOT NULL,
        "role_code" character varying NOT NULL,
        "description" character varying,
        CONSTRAINT "PK_roles" PRIMARY KEY ("id")
      )
    `);
    await queryRunner.query(`CREATE UNIQUE INDEX "UQ_roles_org_name" ON "roles" ("org_id", "name")`);
    await queryRunner.query(`CREATE UNIQUE INDEX "UQ_roles_org_code" ON "roles" ("org_id", "role_code")`);

    await queryRunner.query(`
      CREATE TABLE "permissions" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "createdAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
        "updatedAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
        "org_id" character varying NOT NULL,
        "name" character varying NOT NULL,
        "permission_code" character varying NOT NULL,
        "scope" character varying(16) NOT NULL DEFAULT 'tenant',
        "resource" character varying NOT NULL,
        "action" character varying NOT NULL,
        "description" character varying,
        "active" boolean NOT NULL DEFAULT true,
        CONSTRAINT "PK_permissions" PRIMARY KEY ("id")
      )
    `);
    await queryRunner.query(`CREATE UNIQUE INDEX "UQ_permissions_org_code" ON "permissions" ("org_id", "permission_code")`);

    await queryRunner.query(`
      CREATE TABLE "role_permissions" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "createdAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
        "updatedAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
        "org_id" character varying NOT NULL,
        "role_id" uuid NOT NULL,
        "permission_id" uuid NOT NULL,
        CONSTRAINT "PK_role_permissions" PRIMARY KEY ("id")
      )
    `);
    await queryRunner.query(
      `CREATE UNIQUE INDEX "UQ_role_permissions_role_permission" ON "role_permissions" ("role_id", "permission_id")`,
    );
    await queryRunner.query(`CREATE INDEX "IDX_role_permissions_permission" ON "role_permissions" ("permission_id")`);

    await queryRunner.query(`
      CREATE TABLE "refresh_tokens" (
        "id" uuid NOT NULL,
        "user_id" uuid NOT NULL,
        "token_hash" character varying(64) NOT NULL,
        "expires_at" TIMESTAMP WITH TIME ZONE NOT NULL,
        "revoked_at" TIMESTAMP WITH TIME ZONE,
        "replaced_by" uuid,
        "ip_address" character varying,
        "user_agent" character varying,
        "createdAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
        CONSTRAINT "PK_refresh_tokens" PRIMARY KEY ("id")
      )
    `);
    await queryRunner.query(`CREATE UNIQUE INDEX "UQ_refresh_tokens_token_hash" ON "refresh_tokens" ("token_hash")`);
    await queryRunner.query(`CREATE INDEX "IDX_refresh_tokens_user" ON "refresh_tokens" ("user_id")`);

    await queryRunner.query(`
      CREATE TABLE "audit_logs" (
        "id" uuid NOT NULL DEFAULT uuid_generate_v4(),
        "user_id" character varying NOT NULL,
        "action" character varying NOT NULL,
        "resource" character varying NOT NULL,
        "payload" jsonb NOT NULL,
        "ip_address" character varying,
        "user_agent" character varying,
        "createdAt" TIMESTAMP WITH TIME ZONE NOT NULL DEFAULT now(),
        CONSTRAINT "PK_audit_logs" PRIMARY KEY ("id")
      )
    `);
    await queryRunner.query(`CREATE INDEX "IDX_audit_logs_user_created" ON "audit_logs" ("user_id", "createdAt")`);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    // 按创建的逆序删除
    await queryRunner.query(`DROP TABLE "audit_logs"`);
    await queryRunner.query(`DROP TABLE "refresh_tokens"`);
    await queryRunner.query(`DROP TABLE "role_permissions"`);
    await queryRunner.query(`DROP TABLE "permissions"`);
    await queryRunner.query(`DROP TABLE "roles"`);
    await queryRunner.query(`DROP TABLE "users"`);
  }
}
