import {
  BadRequestException,
  Body,
  Controller,
  Get,
  HttpCode,
  HttpException,
  Logger,
  Post,
  Query,
  Req,
  UnauthorizedException,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import type { Request } from 'express';

import { CommandsService } from './commands.service';
import { RolesGuard } from '../auth/roles/roles.guard';
import { Roles } from '../roles/roles.decorator';
import { readStaff } from '../auth/staff-user';
import { messageOf } from '../common/device-envelope';
import { bodyFields, firstParam, paramText } from '../common/request-params';

@Controller()
export class CommandsController {
  private readonly logger = new Logger(CommandsController.name);

  constructor(private readonly commands: CommandsService) {}

  // Controllers poll this every couple of seconds.
  @Get('api/manual-trigger')
  triggerGet(@Query('room') room?: string) {
    return this.trigger(paramText(room));
  }

  @Post('api/manual-trigger')
  @HttpCode(200)
  async triggerPost(@Query('room') room: string | undefined, @Body() body: unknown) {
    return this.trigger(firstParam(room, bodyFields(body).room));
  }

  private async trigger(room: string) {
    if (!room) {
      throw new BadRequestException({
        has_trigger: false,
        action: '',
        message: 'Missing room parameter',
      });
    }

    try {
      const cmd = await this.commands.pollCommands(room, new Date());
      if (!cmd) return { has_trigger: false, action: '', message: 'No pending commands' };

      return {
        has_trigger: true,
        action: cmd.action,
        room,
        message: `Manual ${cmd.action} command`,
        timestamp: cmd.issuedAt.toISOString(),
        staff: cmd.staffName || 'Unknown',
      };
    } catch (err) {
      const message = err instanceof HttpException ? messageOf(err) : 'Server error';
      if (!(err instanceof HttpException)) {
        this.logger.error(
          `Manual trigger poll failed (room=${room}): ${err instanceof Error ? err.message : String(err)}`,
        );
      }
      throw new HttpException(
        { has_trigger: false, action: '', message },
        err instanceof HttpException ? err.getStatus() : 500,
      );
    }
  }

  @UseGuards(AuthGuard('jwt'), RolesGuard)
  @Roles('staff', 'admin')
  @Post('manual-commands')
  async issue(
    @Req() req: Request,
    @Body('roomId') roomId: number,
    @Body('action') action: string,
    @Body('notes') notes?: string,
  ) {
    const staff = readStaff(req);
    if (!staff) throw new UnauthorizedException('Not authenticated.');

    const id = Number(roomId);
    if (!Number.isInteger(id)) throw new BadRequestException('roomId must be an integer.');

    const { command, roomCode } = await this.commands.issueCommand(id, staff, action, notes ?? '', new Date());
    return {
      ok: true,
      id: command.id,
      roomCode,
      action: command.action,
      issuedAt: command.issuedAt.toISOString(),
    };
  }

  @UseGuards(AuthGuard('jwt'), RolesGuard)
  @Roles('staff', 'admin')
  @Get('manual-commands/recent')
  async recent(@Query('limit') limit?: string) {
    const commands = await this.commands.recentCommands(limit ? Number(limit) : undefined);
    return { ok: true, commands };
  }
}
