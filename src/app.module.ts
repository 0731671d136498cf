import { Logger, Module } from '@nestjs/common';
import { TypeOrmModule, TypeOrmModuleOptions } from '@nestjs/typeorm';

import { KeyboxConfigModule } from './config/keybox-config.module';
import { AuthModule } from './auth/auth.module';
import { TermsModule } from './terms/terms.module';
import { RoomsModule } from './rooms/rooms.module';
import { FacultyModule } from './faculty/faculty.module';
import { SchedulesModule } from './schedules/schedules.module';
import { TransactionsModule } from './transactions/transactions.module';
import { AccessModule } from './access/access.module';
import { SyncModule } from './sync/sync.module';
import { DevicesModule } from './devices/devices.module';
import { CommandsModule } from './commands/commands.module';

const hasDbUrl =
  !!process.env.DATABASE_URL && process.env.DATABASE_URL.trim() !== '';

const dbSsl =
  (process.env.DB_SSL || '').toLowerCase() === 'true' ||
  (process.env.PGSSLMODE || '').toLowerCase() === 'require';

// synchronize is never allowed in production
const isProd = (process.env.NODE_ENV || '').toLowerCase() === 'production';
const syncRequested = (process.env.SYNC_DB || '').toLowerCase() === 'true';
const sync = !isProd && syncRequested;

const postgresConfig: TypeOrmModuleOptions = {
  type: 'postgres',
  url: process.env.DATABASE_URL,
  autoLoadEntities: true,
  synchronize: sync,

  ssl: dbSsl ? { rejectUnauthorized: false } : undefined,
  extra: dbSsl ? { ssl: { rejectUnauthorized: false } } : undefined,
};

// local development: SQLite compiled to wasm, saved to the file after each write
const sqliteConfig: TypeOrmModuleOptions = {
  type: 'sqljs',
  location: 'keybox.sqlite',
  autoSave: true,
  autoLoadEntities: true,
  synchronize: sync,
};

const logger = new Logger('Database');
logger.log(`driver=${hasDbUrl ? 'postgres' : 'sqlite'} NODE_ENV=${process.env.NODE_ENV ?? ''}`);
logger.log(`SYNC_DB(requested)=${process.env.SYNC_DB ?? ''} synchronize(effective)=${sync}`);
logger.log(`DB_SSL=${process.env.DB_SSL ?? ''} PGSSLMODE=${process.env.PGSSLMODE ?? ''}`);

@Module({
  imports: [
    TypeOrmModule.forRoot(hasDbUrl ? postgresConfig : sqliteConfig),

    KeyboxConfigModule,
    AuthModule,
    TermsModule,
    RoomsModule,
    FacultyModule,
    SchedulesModule,
    TransactionsModule,
    AccessModule,
    SyncModule,
    DevicesModule,
    CommandsModule,
  ],
})
export class AppModule {}
