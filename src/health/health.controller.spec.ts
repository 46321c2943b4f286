import { Test, TestingModule } from '@nestjs/testing';
import { HealthController } from './health.controller';

describe('HealthController', () => {
  let controller: HealthController;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [HealthController],
    }).compile();

    controller = module.get<HealthController>(HealthController);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  describe('check', () => {
    it('should return status ok with the current ISO timestamp', () => {
      jest.useFakeTimers({ now: new Date('2026-03-01T08:30:00.000Z') });

      expect(controller.check()).toEqual({
        status: 'ok',
        timestamp: '2026-03-01T08:30:00.000Z',
      });
    });
  });
});
