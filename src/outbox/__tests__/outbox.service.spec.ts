import { Test, TestingModule } from '@nestjs/testing';
import { getRepositoryToken } from '@nestjs/typeorm';
import { LessThanOrEqual, Repository } from 'typeorm';
import { OutboxEntity, OutboxStatus } from '../../database/entities';
import { OutboxService } from '../outbox.service';

describe('OutboxService', () => {
  let service: OutboxService;
  let outboxRepository: jest.Mocked<Pick<Repository<OutboxEntity>, 'update' | 'findOneBy' | 'findOneByOrFail'>>;

  const stored = (attempts: number): OutboxEntity => Object.assign(new OutboxEntity(), { id: '7', status: OutboxStatus.PENDING, attempts });

  beforeEach(async () => {
    outboxRepository = {
      update: jest.fn(),
      findOneBy: jest.fn(),
      findOneByOrFail: jest.fn(),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [OutboxService, { provide: getRepositoryToken(OutboxEntity), useValue: outboxRepository }],
    }).compile();

    service = module.get<OutboxService>(OutboxService);
  });

  describe('claim', () => {
    const now = new Date('2024-01-01T00:00:00Z');
    const leaseUntil = new Date('2024-01-01T00:00:10Z');

    it('should take a pending, due event and return the stored row', async () => {
      outboxRepository.update.mockResolvedValue({ affected: 1, raw: {}, generatedMaps: [] });
      outboxRepository.findOneBy.mockResolvedValue(stored(2));

      const claimed = await service.claim('7', now, leaseUntil);

      expect(outboxRepository.update).toHaveBeenCalledWith(
        { id: '7', status: OutboxStatus.PENDING, nextAttemptAt: LessThanOrEqual(now) },
        { nextAttemptAt: leaseUntil },
      );
      expect(claimed).toEqual(stored(2));
    });

    it('should return null when the event is held elsewhere', async () => {
      outboxRepository.update.mockResolvedValue({ affected: 0, raw: {}, generatedMaps: [] });

      expect(await service.claim('7', now, leaseUntil)).toBeNull();
      expect(outboxRepository.findOneBy).not.toHaveBeenCalled();
    });
  });

  describe('recordFailure', () => {
    it('should add the failed tries to the stored count in the database', async () => {
      const nextAttemptAt = new Date('2024-01-01T00:00:02Z');
      outboxRepository.update.mockResolvedValue({ affected: 1, raw: {}, generatedMaps: [] });
      outboxRepository.findOneByOrFail.mockResolvedValue(stored(5));

      const attempts = await service.recordFailure('7', 3, 'broker down', nextAttemptAt);

      expect(attempts).toBe(5);
      const [criteria, changes] = outboxRepository.update.mock.calls[0];
      expect(criteria).toBe('7');
      expect(changes).toMatchObject({ lastError: 'broker down', nextAttemptAt });
      const increment = changes.attempts;
      expect(typeof increment === 'function' ? increment() : increment).toBe('attempts + 3');
    });
  });

  it('should mark an event failed without touching its attempt count', async () => {
    outboxRepository.update.mockResolvedValue({ affected: 1, raw: {}, generatedMaps: [] });

    await service.markFailed('7', 'broker down');

    expect(outboxRepository.update).toHaveBeenCalledWith('7', { status: OutboxStatus.FAILED, lastError: 'broker down' });
  });
});
