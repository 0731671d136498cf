import { Controller, Get, Inject, UseGuards } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';

import { SessionLedgerService } from './session-ledger.service';
import { TERM_SOURCE, TermSource } from '../terms/term-source';
import { RolesGuard } from '../auth/roles/roles.guard';
import { Roles } from '../roles/roles.decorator';

@Controller('transactions')
@UseGuards(AuthGuard('jwt'), RolesGuard)
@Roles('staff', 'admin')
export class TransactionsController {
  constructor(
    private readonly ledger: SessionLedgerService,
    @Inject(TERM_SOURCE) private readonly terms: TermSource,
  ) {}

  // keys currently out in the current term
  @Get('open')
  async open() {
    const term = await this.terms.getCurrentTerm();
    const sessions = await this.ledger.listOpenSessions(term);

    return {
      ok: true,
      academicYear: term.academicYear,
      semester: term.semester,
      count: sessions.length,
      sessions: sessions.map((s) => ({
        id: s.id,
        facultyName: s.facultyName,
        roomCode: s.roomCode,
        badgeCode: s.badgeCode,
        openTime: s.openTime.toISOString(),
        source: s.source,
      })),
    };
  }
}
