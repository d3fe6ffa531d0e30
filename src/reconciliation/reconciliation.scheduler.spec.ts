import { Test, TestingModule } from '@nestjs/testing';
import { getLoggerToken } from 'nestjs-pino';
import { reconciliationConfig, ReconciliationConfig } from '../config/configuration';
import { ReconciliationScheduler } from './reconciliation.scheduler';
import { ReconciliationService } from './reconciliation.service';
import { SweepReport } from './types/reconciliation.types';

describe('ReconciliationScheduler', () => {
  const mockLogger = {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  };

  const report: SweepReport = {
    startedAt: new Date(0),
    cutoff: new Date(0),
    scanned: 0,
    failed: 0,
    skipped: 0,
    errors: 0,
  };

  const mockService = { sweep: jest.fn() };

  const build = async (overrides: Partial<ReconciliationConfig> = {}) => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ReconciliationScheduler,
        { provide: ReconciliationService, useValue: mockService },
        {
          provide: reconciliationConfig.KEY,
          useValue: { enabled: true, intervalMs: 1000, staleMinutes: 15, batchSize: 500, ...overrides },
        },
        { provide: getLoggerToken(ReconciliationScheduler.name), useValue: mockLogger },
      ],
    }).compile();

    return module.get<ReconciliationScheduler>(ReconciliationScheduler);
  };

  beforeEach(() => {
    jest.clearAllMocks();
    mockService.sweep.mockResolvedValue(report);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('should sweep on every interval once started', async () => {
    const scheduler = await build();
    jest.useFakeTimers();
    scheduler.onModuleInit();

    await jest.advanceTimersByTimeAsync(3000);

    expect(mockService.sweep).toHaveBeenCalledTimes(3);
    scheduler.onModuleDestroy();
  });

  it('should not start when disabled', async () => {
    const scheduler = await build({ enabled: false });
    jest.useFakeTimers();
    scheduler.onModuleInit();

    await jest.advanceTimersByTimeAsync(5000);

    expect(mockService.sweep).not.toHaveBeenCalled();
    expect(mockLogger.info).toHaveBeenCalledWith('Reconciliation sweep disabled');
  });

  it('should stop sweeping after module destroy', async () => {
    const scheduler = await build();
    jest.useFakeTimers();
    scheduler.onModuleInit();
    scheduler.onModuleDestroy();

    await jest.advanceTimersByTimeAsync(5000);

    expect(mockService.sweep).not.toHaveBeenCalled();
  });

  it('should skip a tick while the previous sweep is still running', async () => {
    let finish: (value: SweepReport) => void = () => undefined;
    mockService.sweep.mockImplementationOnce(
      () => new Promise<SweepReport>(resolve => (finish = resolve)),
    );
    const scheduler = await build();

    const first = scheduler.tick();
    await scheduler.tick();
    finish(report);
    await first;

    expect(mockService.sweep).toHaveBeenCalledTimes(1);
    expect(mockLogger.warn).toHaveBeenCalledWith('Previous reconciliation sweep still running, skipping');
  });

  it('should log a failed sweep and run again next time', async () => {
    mockService.sweep.mockRejectedValueOnce(new Error('database unavailable'));
    const scheduler = await build();

    await scheduler.tick();
    await scheduler.tick();

    expect(mockService.sweep).toHaveBeenCalledTimes(2);
    expect(mockLogger.error).toHaveBeenCalledWith(
      expect.objectContaining({ err: expect.any(Error) }),
      'Reconciliation sweep failed',
    );
  });
});
