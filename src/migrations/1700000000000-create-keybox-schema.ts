import { MigrationInterface, QueryRunner } from 'typeorm';

type Dialect = {
  pk: string;
  ts: string;
  now: string;
  yes: string;
};

const POSTGRES: Dialect = {
  pk: 'SERIAL PRIMARY KEY',
  ts: 'timestamp',
  now: 'now()',
  yes: 'true',
};

const SQLITE: Dialect = {
  pk: 'integer PRIMARY KEY AUTOINCREMENT NOT NULL',
  ts: 'datetime',
  now: `(datetime('now'))`,
  yes: '1',
};

export class CreateKeyboxSchema1700000000000 implements MigrationInterface {
  name = 'CreateKeyboxSchema1700000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    const d = queryRunner.connection.options.type === 'postgres' ? POSTGRES : SQLITE;

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS "room_entity" (
        "id" ${d.pk},
        "code" varchar(10) NOT NULL UNIQUE,
        "description" varchar(100) NOT NULL DEFAULT '',
        "isActive" boolean NOT NULL DEFAULT ${d.yes},
        "schedulesRevisedAt" ${d.ts},
        "createdAt" ${d.ts} NOT NULL DEFAULT ${d.now},
        "updatedAt" ${d.ts} NOT NULL DEFAULT ${d.now}
      )
    `);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS "faculty_entity" (
        "id" ${d.pk},
        "schoolId" varchar(50) NOT NULL UNIQUE,
        "fullName" varchar(150) NOT NULL DEFAULT '',
        "department" varchar(10) NOT NULL DEFAULT 'COE',
        "isActive" boolean NOT NULL DEFAULT ${d.yes}
      )
    `);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS "credential_entity" (
        "id" ${d.pk},
        "badgeCode" varchar(50) NOT NULL UNIQUE,
        "facultyId" integer NOT NULL,
        "roomId" integer NOT NULL,
        "isActive" boolean NOT NULL DEFAULT ${d.yes},
        "createdAt" ${d.ts} NOT NULL DEFAULT ${d.now}
      )
    `);
    await queryRunner.query(
      `CREATE INDEX IF NOT EXISTS "idx_credential_faculty_room" ON "credential_entity" ("facultyId", "roomId")`,
    );

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS "schedule_window_entity" (
        "id" ${d.pk},
        "roomId" integer NOT NULL,
        "semester" varchar(10) NOT NULL DEFAULT '1st',
        "days" text NOT NULL,
        "startTime" varchar(5) NOT NULL,
        "endTime" varchar(5) NOT NULL,
        "subject" varchar(100) NOT NULL DEFAULT '',
        "instructorName" varchar(100) NOT NULL DEFAULT '',
        "facultyId" integer,
        "isActive" boolean NOT NULL DEFAULT ${d.yes},
        "createdAt" ${d.ts} NOT NULL DEFAULT ${d.now},
        "updatedAt" ${d.ts} NOT NULL DEFAULT ${d.now}
      )
    `);
    await queryRunner.query(
      `CREATE INDEX IF NOT EXISTS "idx_window_room_semester_faculty" ON "schedule_window_entity" ("roomId", "semester", "facultyId")`,
    );

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS "term_entity" (
        "id" integer PRIMARY KEY NOT NULL,
        "academicYear" varchar(20) NOT NULL DEFAULT '2025-2026',
        "semester" varchar(10) NOT NULL DEFAULT '1st',
        "updatedAt" ${d.ts} NOT NULL DEFAULT ${d.now}
      )
    `);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS "transaction_entity" (
        "id" ${d.pk},
        "credentialId" integer,
        "roomId" integer,
        "facultyName" varchar(150) NOT NULL DEFAULT '',
        "roomCode" varchar(10) NOT NULL DEFAULT '',
        "badgeCode" varchar(50) NOT NULL DEFAULT '',
        "academicYear" varchar(20) NOT NULL,
        "semester" varchar(10) NOT NULL,
        "openTime" ${d.ts} NOT NULL,
        "closeTime" ${d.ts},
        "accessGranted" boolean NOT NULL DEFAULT ${d.yes},
        "denialCode" varchar(40),
        "denialReason" varchar(200),
        "scheduleWindowId" integer,
        "source" varchar(10) NOT NULL DEFAULT 'live'
      )
    `);
    // one open (granted, unclosed) session per credential/room/term
    await queryRunner.query(
      `CREATE UNIQUE INDEX IF NOT EXISTS "uq_transaction_open_session" ON "transaction_entity" ("credentialId", "roomId", "academicYear", "semester") WHERE "closeTime" IS NULL AND "accessGranted" = ${d.yes}`,
    );
    await queryRunner.query(
      `CREATE INDEX IF NOT EXISTS "idx_transaction_term_open" ON "transaction_entity" ("academicYear", "semester", "openTime")`,
    );

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS "device_entity" (
        "id" ${d.pk},
        "deviceName" varchar(50) NOT NULL UNIQUE,
        "deviceId" varchar(100) NOT NULL UNIQUE,
        "roomId" integer,
        "ipAddress" varchar(45),
        "lastHeartbeat" ${d.ts},
        "firmwareVersion" varchar(20) NOT NULL DEFAULT '',
        "isActive" boolean NOT NULL DEFAULT ${d.yes},
        "createdAt" ${d.ts} NOT NULL DEFAULT ${d.now},
        "updatedAt" ${d.ts} NOT NULL DEFAULT ${d.now}
      )
    `);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS "manual_command_entity" (
        "id" ${d.pk},
        "roomId" integer NOT NULL,
        "staffId" varchar(100),
        "staffName" varchar(150) NOT NULL DEFAULT '',
        "action" varchar(10) NOT NULL,
        "notes" text NOT NULL DEFAULT '',
        "issuedAt" ${d.ts} NOT NULL
      )
    `);
    await queryRunner.query(
      `CREATE INDEX IF NOT EXISTS "idx_command_room_issued" ON "manual_command_entity" ("roomId", "issuedAt")`,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    for (const table of [
      'manual_command_entity',
      'device_entity',
      'transaction_entity',
      'term_entity',
      'schedule_window_entity',
      'credential_entity',
      'faculty_entity',
      'room_entity',
    ]) {
      await queryRunner.query(`DROP TABLE IF EXISTS "${table}"`);
    }
  }
}
