import { Body, Controller, Get, Patch, UseGuards } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';

import { TermsService } from './terms.service';
import { RolesGuard } from '../auth/roles/roles.guard';
import { Roles } from '../roles/roles.decorator';

@Controller('terms')
@UseGuards(AuthGuard('jwt'), RolesGuard)
@Roles('staff', 'admin')
export class TermsController {
  constructor(private readonly terms: TermsService) {}

  @Get('current')
  async current() {
    const term = await this.terms.getCurrentTerm();
    return { ok: true, term };
  }

  // Controllers see the change on their next check-updates call.
  @Patch('current')
  async update(
    @Body('academicYear') academicYear: string,
    @Body('semester') semester: string,
  ) {
    const term = await this.terms.updateCurrentTerm(academicYear, semester, new Date());
    return { ok: true, term };
  }
}
