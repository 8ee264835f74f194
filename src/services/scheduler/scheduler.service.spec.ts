import { Test, TestingModule } from '@nestjs/testing';
import { AppEnvironment } from '../../app.environment';
import { createEnvironment } from '../../testing/fixtures';
import { RunOptions } from '../../models/report';
import { LogService } from '../log/log.service';
import { ReportService } from '../report/report.service';
import { SchedulerService } from './scheduler.service';

describe('SchedulerService', () => {
  let service: SchedulerService;
  let logService: LogService;
  const execute = jest.fn<Promise<number>, [RunOptions?]>();

  beforeEach(async () => {
    execute.mockReset();
    execute.mockResolvedValue(0);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        SchedulerService,
        LogService,
        { provide: ReportService, useValue: { execute } },
        { provide: AppEnvironment, useValue: createEnvironment() },
      ],
    }).compile();

    service = module.get<SchedulerService>(SchedulerService);
    logService = module.get<LogService>(LogService);
  });

  it('should do nothing on a tick before the daemon starts', async () => {
    await service.runDailyReport();

    expect(execute).not.toHaveBeenCalled();
  });

  it('should run once on start and again on every tick', async () => {
    await expect(service.start()).resolves.toBe(0);
    await service.runDailyReport();

    expect(execute).toHaveBeenCalledTimes(2);
  });

  it('should pass dry run options to the first run and every tick', async () => {
    await service.start({ dryRun: true });
    await service.runDailyReport();

    expect(execute).toHaveBeenNthCalledWith(1, { dryRun: true });
    expect(execute).toHaveBeenNthCalledWith(2, { dryRun: true });
  });

  it('should log a failed tick and keep running', async () => {
    const warn = jest.spyOn(logService, 'warn');
    await service.start();
    execute.mockResolvedValue(4);

    await service.runDailyReport();

    expect(warn).toHaveBeenCalledWith('Scheduled report failed with exit code 4, waiting for the next tick');
    expect(service.isEnabled).toBe(true);
  });

  it('should stop acting on ticks once stopped', async () => {
    await service.start();
    service.stop();
    await service.runDailyReport();

    expect(execute).toHaveBeenCalledTimes(1);
  });
});
