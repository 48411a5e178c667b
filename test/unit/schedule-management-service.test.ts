import { DEFAULT_JOB_PATTERNS, ScheduleManagementService } from '../../src/services/schedule-management-service';
import { createMockLogger, MockLogger } from '../mocks';

describe('ScheduleManagementService', () => {
  let logger: MockLogger;
  let service: ScheduleManagementService;

  beforeEach(() => {
    logger = createMockLogger();
    service = new ScheduleManagementService(logger, 'UTC');
  });

  describe('runNow', () => {
    it('runs a registered job and records the execution', async () => {
      const callback = jest.fn().mockResolvedValue(undefined);
      service.register('tick', callback);

      const result = await service.runNow('tick');

      expect(callback).toHaveBeenCalledTimes(1);
      expect(result?.jobType).toBe('tick');
      expect(result?.success).toBe(true);
      expect(result?.error).toBeUndefined();
      expect(service.getStatus().tick?.executionCount).toBe(1);
      expect(service.getStatus().tick?.lastRun).toBe(result?.startTime);
    });

    it('reports a failing job without throwing', async () => {
      service.register('cadence', jest.fn().mockRejectedValue(new Error('boom')));

      const result = await service.runNow('cadence');

      expect(result?.success).toBe(false);
      expect(result?.error).toBe('boom');
      expect(logger.error).toHaveBeenCalledWith('cadence job failed', expect.any(Error), {
        executionId: result?.executionId
      });
    });

    it('skips a run while the previous one is still busy', async () => {
      let release: () => void = () => undefined;
      const callback = jest.fn(() => new Promise<void>((resolve) => {
        release = resolve;
      }));
      service.register('tick', callback);

      const first = service.runNow('tick');
      await expect(service.runNow('tick')).resolves.toBeNull();
      release();
      await expect(first).resolves.toMatchObject({ success: true });
      expect(callback).toHaveBeenCalledTimes(1);
    });

    it('returns null for a job that was never registered', async () => {
      await expect(service.runNow('retention')).resolves.toBeNull();
      expect(logger.warn).toHaveBeenCalledWith('No retention job registered');
    });

    it('lists executions newest first', async () => {
      service.register('tick', jest.fn().mockResolvedValue(undefined));
      service.register('retention', jest.fn().mockResolvedValue(undefined));
      await service.runNow('tick');
      await service.runNow('retention');

      expect(service.getExecutionHistory().map((r) => r.jobType)).toEqual(['retention', 'tick']);
      expect(service.getExecutionHistory(1).map((r) => r.jobType)).toEqual(['retention']);
    });
  });

  describe('cron', () => {
    beforeEach(() => {
      jest.useFakeTimers({ now: new Date('2024-01-01T00:02:00.000Z') });
    });

    afterEach(() => {
      service.stop();
      jest.useRealTimers();
    });

    it('uses the default patterns unless overridden', () => {
      const custom = new ScheduleManagementService(logger, 'UTC', { cadence: '0 */30 * * * *' });
      custom.register('tick', jest.fn());
      custom.register('cadence', jest.fn());

      const status = custom.getStatus();
      expect(status.tick?.cronPattern).toBe(DEFAULT_JOB_PATTERNS.tick);
      expect(status.cadence?.cronPattern).toBe('0 */30 * * * *');
    });

    it('schedules registered jobs until stopped', () => {
      service.register('tick', jest.fn().mockResolvedValue(undefined));
      service.start();

      const running = service.getStatus().tick;
      expect(running?.running).toBe(true);
      expect(Date.parse(running?.nextRun ?? '')).toBe(Date.parse('2024-01-01T00:05:00.000Z'));

      service.stop();
      expect(service.getStatus().tick).toMatchObject({ running: false, nextRun: null });
      expect(logger.log).toHaveBeenCalledWith('tick job stopped');
    });
  });
});
