import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { RecurringScheduler } from '../recurring.scheduler';
import { RecurringService, SweepResult } from '../recurring.service';

const emptySweep: SweepResult = {
  today: '2026-03-15',
  due: 0,
  generated: 0,
  deactivated: 0,
  failures: [],
};

const mockRecurring = { processDue: jest.fn() };

async function buildScheduler(enabled: string | undefined) {
  const module: TestingModule = await Test.createTestingModule({
    providers: [
      RecurringScheduler,
      { provide: RecurringService, useValue: mockRecurring },
      {
        provide: ConfigService,
        useValue: { get: jest.fn().mockReturnValue(enabled) },
      },
    ],
  }).compile();
  return module.get(RecurringScheduler);
}

describe('RecurringScheduler', () => {
  beforeEach(() => {
    jest.clearAllMocks();
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    jest.spyOn(Logger.prototype, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => jest.restoreAllMocks());

  it('runs the sweep when enabled (default)', async () => {
    mockRecurring.processDue.mockResolvedValue(emptySweep);
    const scheduler = await buildScheduler(undefined);

    await expect(scheduler.sweep()).resolves.toEqual(emptySweep);
    expect(mockRecurring.processDue).toHaveBeenCalledTimes(1);
  });

  it('does nothing when disabled', async () => {
    const scheduler = await buildScheduler('false');
    await expect(scheduler.sweep()).resolves.toBeNull();
    expect(mockRecurring.processDue).not.toHaveBeenCalled();
  });

  it('skips a sweep while the previous one is still running', async () => {
    let finish: (r: SweepResult) => void = () => undefined;
    mockRecurring.processDue.mockReturnValue(
      new Promise<SweepResult>((resolve) => {
        finish = resolve;
      }),
    );
    const scheduler = await buildScheduler('true');

    const first = scheduler.sweep();
    await expect(scheduler.sweep()).resolves.toBeNull();
    finish(emptySweep);
    await expect(first).resolves.toEqual(emptySweep);
    expect(mockRecurring.processDue).toHaveBeenCalledTimes(1);
  });

  it('logs and survives an aborted sweep', async () => {
    mockRecurring.processDue.mockRejectedValue(new Error('database unavailable'));
    const scheduler = await buildScheduler('true');

    await expect(scheduler.sweep()).resolves.toBeNull();
    expect(Logger.prototype.error).toHaveBeenCalledWith(
      'Recurring sweep aborted: database unavailable',
    );

    mockRecurring.processDue.mockResolvedValue(emptySweep);
    await expect(scheduler.sweep()).resolves.toEqual(emptySweep);
  });
});
