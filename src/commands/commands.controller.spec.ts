import { Test, TestingModule } from '@nestjs/testing';

import { CommandsController } from './commands.controller';
import { CommandsService } from './commands.service';

describe('CommandsController', () => {
  let controller: CommandsController;
  const pollCommands = jest.fn();

  beforeEach(async () => {
    pollCommands.mockReset();

    const module: TestingModule = await Test.createTestingModule({
      controllers: [CommandsController],
      providers: [{ provide: CommandsService, useValue: { pollCommands } }],
    }).compile();

    controller = module.get<CommandsController>(CommandsController);
  });

  it('hands a fresh command to the polling controller', async () => {
    pollCommands.mockResolvedValue({
      action: 'open',
      issuedAt: new Date('2025-09-01T08:00:00Z'),
      staffName: 'Desk Officer',
    });

    await expect(controller.triggerGet('205')).resolves.toEqual({
      has_trigger: true,
      action: 'open',
      room: '205',
      message: 'Manual open command',
      timestamp: '2025-09-01T08:00:00.000Z',
      staff: 'Desk Officer',
    });
  });

  it('reports when nothing is pending', async () => {
    pollCommands.mockResolvedValue(null);

    await expect(controller.triggerPost(undefined, { room: '205' })).resolves.toEqual({
      has_trigger: false,
      action: '',
      message: 'No pending commands',
    });
    expect(pollCommands).toHaveBeenCalledWith('205', expect.any(Date));
  });

  it('answers 400 without a room', async () => {
    await expect(controller.triggerGet()).rejects.toMatchObject({
      status: 400,
      response: { has_trigger: false, action: '', message: 'Missing room parameter' },
    });
  });
});
