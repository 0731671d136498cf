import 'reflect-metadata';
import { DataSource } from 'typeorm';

const hasDbUrl =
  !!process.env.DATABASE_URL && process.env.DATABASE_URL.trim() !== '';

const dbSsl =
  (process.env.DB_SSL || '').toLowerCase() === 'true' ||
  (process.env.PGSSLMODE || '').toLowerCase() === 'require';

// used by the TypeORM CLI against the compiled build
export const AppDataSource = new DataSource(
  hasDbUrl
    ? {
        type: 'postgres',
        url: process.env.DATABASE_URL,
        ssl: dbSsl ? { rejectUnauthorized: false } : undefined,
        extra: dbSsl ? { ssl: { rejectUnauthorized: false } } : undefined,
        entities: ['dist/**/*.entity.js'],
        migrations: ['dist/migrations/*.js'],
        synchronize: false,
        logging: false,
      }
    : {
        type: 'sqljs',
        location: 'keybox.sqlite',
        autoSave: true,
        entities: ['dist/**/*.entity.js'],
        migrations: ['dist/migrations/*.js'],
        synchronize: false,
        logging: false,
      },
);
