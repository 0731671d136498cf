import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';

import { TermEntity } from './term.entity';
import { TermsService } from './terms.service';
import { TermsController } from './terms.controller';
import { TERM_SOURCE } from './term-source';

@Module({
  imports: [TypeOrmModule.forFeature([TermEntity])],
  controllers: [TermsController],
  providers: [TermsService, { provide: TERM_SOURCE, useExisting: TermsService }],
  exports: [TermsService, TERM_SOURCE],
})
export class TermsModule {}
