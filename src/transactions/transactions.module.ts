import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';

import { TransactionEntity } from './transaction.entity';
import { SessionLedgerService } from './session-ledger.service';
import { TransactionsController } from './transactions.controller';
import { TermsModule } from '../terms/terms.module';

@Module({
  imports: [TypeOrmModule.forFeature([TransactionEntity]), TermsModule],
  controllers: [TransactionsController],
  providers: [SessionLedgerService],
  exports: [SessionLedgerService],
})
export class TransactionsModule {}
